/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";
import { container, DIContainer } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { TerminologyDictionary } from "./terminology/dictionary";
import { toError } from "./shared/errors/toError";
import { createApp } from "./app";

async function bootstrap(): Promise<void> {
  DIContainer.initialize();

  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);
  const dictionary = container.resolve<TerminologyDictionary>(
    TYPES.TerminologyDictionary,
  );

  logger.info("Starting API server...", { dictionaryDir: config.dictionaryDir });

  // Load errors leave the dictionary empty; the server still starts
  await dictionary.load(config.dictionaryDir);

  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info("API server started", {
      port: config.port,
      env: config.nodeEnv,
      orthodoxMode: config.orthodoxMode,
      terms: dictionary.size,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    server.close((error) => {
      if (error) {
        logger.error("Error while closing server", error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

bootstrap().catch((error: unknown) => {
  console.error("Failed to start server:", toError(error));
  process.exit(1);
});
