import { Router } from "express";
import { container } from "../../../di/Container";
import { TerminologyController } from "../controllers/TerminologyController";

export function createTerminologyRouter(): Router {
  const router = Router();
  const controller = container.resolve(TerminologyController);

  // POST /api/v1/terminology/matches - Scan text for dictionary terms
  router.post("/matches", (req, res, next) => controller.matches(req, res, next));

  return router;
}
