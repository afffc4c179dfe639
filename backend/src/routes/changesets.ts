import { Router } from "express";
import type { AppContext } from "../context";
import { requireOpsAdmin, requireOpsAuth } from "../middlewares/auth";
import { changesetFromProposal } from "../services/changeset";

export function createChangesetsRouter(context: AppContext): Router {
  const router = Router();

  // Accepts the canonical changeset or a legacy planner proposal.
  router.post("/apply", requireOpsAuth, requireOpsAdmin, (req, res, next) => {
    try {
      const changeset = changesetFromProposal(req.body);
      res.json(context.changesetEngine.apply(changeset));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
