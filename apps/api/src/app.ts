import "reflect-metadata";
import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { TerminologyDictionary } from "./terminology/dictionary";

// Routes
import { createPromptsRouter } from "./presentation/http/routes/prompts.routes";
import { createTerminologyRouter } from "./presentation/http/routes/terminology.routes";
import { createScriptureRouter } from "./presentation/http/routes/scripture.routes";

// Middleware
import { errorHandler } from "./presentation/http/middleware/ErrorHandler";

/**
 * Build the Express app from the registered container
 */
export function createApp(): Express {
  const app = express();
  const config = container.resolve<IConfig>(TYPES.Config);
  const dictionary = container.resolve<TerminologyDictionary>(
    TYPES.TerminologyDictionary,
  );

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Logging
  if (config.nodeEnv !== "test") {
    app.use(morgan("combined"));
  }

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "orthodox-prompt-api",
      terms: dictionary.size,
      orthodoxMode: config.orthodoxMode,
    });
  });

  // API Routes (v1)
  app.use("/api/v1/prompts", createPromptsRouter());
  app.use("/api/v1/terminology", createTerminologyRouter());
  app.use("/api/v1/scripture", createScriptureRouter());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found", code: "NOT_FOUND" });
  });

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}
