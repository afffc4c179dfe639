import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { requireOpsAuth } from "../middlewares/auth";
import { summarizeTraces } from "../services/reports/metricsSummary";

const listTracesQuery = z.object({
  subject_id: z.string().min(1).optional(),
  version_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().optional()
});

export function createTracesRouter(context: AppContext): Router {
  const router = Router();

  router.get("/", requireOpsAuth, (req, res, next) => {
    try {
      const query = listTracesQuery.parse(req.query);
      const traces = context.traceStore.load({
        filters: { subject_id: query.subject_id, version_id: query.version_id },
        limit: query.limit
      });
      res.json({ traces });
    } catch (e) {
      next(e);
    }
  });

  router.get("/summary", requireOpsAuth, (_req, res, next) => {
    try {
      res.json({ versions: summarizeTraces(context.traceStore.load()) });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
