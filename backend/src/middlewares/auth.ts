import { type NextFunction, type Request, type Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { env } from "../config/env";
import { HttpError } from "../utils/httpError";

const AuthTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(["OPS_ADMIN", "OPS_REVIEWER"]).default("OPS_REVIEWER")
});

export function requireOpsAuth(req: Request, _res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    next(new HttpError(401, "Missing bearer token"));
    return;
  }

  const token = authHeader.slice("Bearer ".length);
  try {
    const decoded = AuthTokenPayloadSchema.parse(jwt.verify(token, env.JWT_SECRET));
    req.authUser = { id: decoded.sub, role: decoded.role };
    next();
  } catch {
    next(new HttpError(401, "Invalid token"));
  }
}

/** Runs and applies change files on disk; reviewers may only read. Use after requireOpsAuth. */
export function requireOpsAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (req.authUser?.role !== "OPS_ADMIN") {
    next(new HttpError(403, "Ops admin role required"));
    return;
  }
  next();
}
