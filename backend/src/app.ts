import express from "express";
import { buildContext, type AppContext } from "./context";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { createChangesetsRouter } from "./routes/changesets";
import { createEvalsRouter } from "./routes/evals";
import { createMemoriesRouter } from "./routes/memories";
import { createTracesRouter } from "./routes/traces";

export function createApp(context: AppContext = buildContext()) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/evals", createEvalsRouter(context));
  app.use("/api/traces", createTracesRouter(context));
  app.use("/api/memories", createMemoriesRouter(context));
  app.use("/api/changesets", createChangesetsRouter(context));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
