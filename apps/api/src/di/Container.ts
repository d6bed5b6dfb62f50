import "reflect-metadata";
import { container, DependencyContainer } from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Terminology
import { SimilarityEngine } from "../terminology/similarity";
import { TerminologyDictionary } from "../terminology/dictionary";

// Scripture
import { HttpPassageClient, IPassageClient } from "../bible/passageClient";
import { ScriptureResolver } from "../bible/scriptureResolver";
import { FootnoteProcessor } from "../bible/footnoteProcessor";

// Use Cases
import { ProcessUserMessageUseCase } from "../application/prompts/use-cases/ProcessUserMessageUseCase";
import { FindTermMatchesUseCase } from "../application/terminology/use-cases/FindTermMatchesUseCase";
import { ResolvePassageUseCase } from "../application/scripture/use-cases/ResolvePassageUseCase";
import { AddFootnotesUseCase } from "../application/scripture/use-cases/AddFootnotesUseCase";

/**
 * Replacements for the production collaborators, used by tests
 */
export interface ContainerOverrides {
  config?: IConfig;
  logger?: ILogger;
  passageClient?: IPassageClient;
}

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations. The domain
 * classes take plain constructor arguments, so they are built here and
 * registered as instances; use cases are resolved through decorators.
 */
export class DIContainer {
  static initialize(
    target: DependencyContainer = container,
    overrides: ContainerOverrides = {},
  ): DependencyContainer {
    // Configuration
    const config = overrides.config ?? new EnvConfig();
    target.registerInstance<IConfig>(TYPES.Config, config);

    // Logging
    const logger =
      overrides.logger ?? new PinoLogger("orthodox-prompt-api", config.logLevel);
    target.registerInstance<ILogger>(TYPES.Logger, logger);

    // Terminology (loaded once at start-up, read-only afterwards)
    const similarity = new SimilarityEngine(config.similarityWeights);
    target.registerInstance(
      TYPES.TerminologyDictionary,
      new TerminologyDictionary(similarity, logger.child({ component: "dictionary" })),
    );

    // Scripture
    const passageClient =
      overrides.passageClient ??
      new HttpPassageClient(
        {
          endpoint: config.passageServiceUrl,
          timeoutMs: config.passageTimeoutMs,
        },
        logger.child({ component: "passage-client" }),
      );
    const resolver = new ScriptureResolver(
      passageClient,
      logger.child({ component: "scripture" }),
      config.passageSourceLang,
    );
    target.registerInstance(TYPES.ScriptureResolver, resolver);
    target.registerInstance(
      TYPES.FootnoteProcessor,
      new FootnoteProcessor(
        resolver,
        logger.child({ component: "footnotes" }),
        config.passageSourceLang,
      ),
    );

    // Use Cases
    target.register(TYPES.ProcessUserMessageUseCase, {
      useClass: ProcessUserMessageUseCase,
    });
    target.register(TYPES.FindTermMatchesUseCase, {
      useClass: FindTermMatchesUseCase,
    });
    target.register(TYPES.ResolvePassageUseCase, {
      useClass: ResolvePassageUseCase,
    });
    target.register(TYPES.AddFootnotesUseCase, {
      useClass: AddFootnotesUseCase,
    });

    return target;
  }
}

export { container };
