import { SimilarityWeights } from "../../terminology/types";

/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 * Implementations can come from environment variables, files, or config services.
 */

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;

  // Terminology
  readonly dictionaryDir: string;
  readonly minMatchScore: number;
  readonly similarityWeights: SimilarityWeights;

  // Prompt construction
  readonly orthodoxMode: boolean;

  // Passage service
  readonly passageServiceUrl: string;
  readonly passageSourceLang: string;
  readonly passageTargetLang: string;
  readonly passageTimeoutMs: number;

  // Validation
  validate(): void;
}
