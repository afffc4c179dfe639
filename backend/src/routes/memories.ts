import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { requireOpsAuth } from "../middlewares/auth";

const listMemoriesQuery = z.object({
  type: z.enum(["best_practice", "failure_pattern", "config_change", "eval_outcome", "prompt_tweak"]).optional(),
  subject_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().optional()
});

export function createMemoriesRouter(context: AppContext): Router {
  const router = Router();

  router.get("/", requireOpsAuth, (req, res, next) => {
    try {
      const query = listMemoriesQuery.parse(req.query);
      res.json({ memories: context.memoryStore.loadMemories(query) });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
