import { Router } from "express";
import { container } from "../../../di/Container";
import { PromptsController } from "../controllers/PromptsController";

export function createPromptsRouter(): Router {
  const router = Router();
  const controller = container.resolve(PromptsController);

  // POST /api/v1/prompts - Classify a message and build its prompt
  router.post("/", (req, res, next) => controller.process(req, res, next));

  return router;
}
