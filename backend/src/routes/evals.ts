import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { requireOpsAdmin, requireOpsAuth } from "../middlewares/auth";
import { isEvalRunError } from "../services/evaluation";
import { distillMemories } from "../services/records/distill";

const runEvalSchema = z.object({
  version_id: z.string().min(1).optional(),
  /** Distill best-practice / failure-pattern memories from judged records. */
  record_memories: z.boolean().default(true)
});

export function createEvalsRouter(context: AppContext): Router {
  const router = Router();

  router.post("/run", requireOpsAuth, requireOpsAdmin, async (req, res, next) => {
    try {
      const body = runEvalSchema.parse(req.body ?? {});
      const result = await context.getEvalEngine().runFullEval(body.version_id);
      if (isEvalRunError(result)) {
        res.status(422).json(result);
        return;
      }
      const distilled = body.record_memories ? distillMemories(result, context.memoryStore) : null;
      res.json({ summary: result, distilled });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
