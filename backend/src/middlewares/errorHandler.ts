import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { ChangesetError } from "../services/changeset/errors";
import { HttpError } from "../utils/httpError";

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ error: error.issues.map((i) => i.message).join(", ") });
    return;
  }

  if (error instanceof ChangesetError) {
    res.status(400).json({ error: error.message, type: error.name });
    return;
  }

  console.error(error);
  res.status(500).json({ error: "Internal server error" });
}
