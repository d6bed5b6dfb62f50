import { Router } from "express";
import { container } from "../../../di/Container";
import { ScriptureController } from "../controllers/ScriptureController";

export function createScriptureRouter(): Router {
  const router = Router();
  const controller = container.resolve(ScriptureController);

  // POST /api/v1/scripture/resolve - Look up one citation
  router.post("/resolve", (req, res, next) => controller.resolve(req, res, next));

  // POST /api/v1/scripture/footnotes - Footnote annotated text
  router.post("/footnotes", (req, res, next) =>
    controller.footnotes(req, res, next),
  );

  return router;
}
