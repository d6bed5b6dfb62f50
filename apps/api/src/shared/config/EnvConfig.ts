import path from "path";
import { injectable } from "tsyringe";
import { IConfig } from "./IConfig";
import { SimilarityWeights } from "../../terminology/types";

export const DEFAULT_PASSAGE_SERVICE_URL =
  "https://ponomarserver-production.up.railway.app/pericope";

// apps/api/data from the sources; `npm run build` copies it to dist/data
export const DEFAULT_DICTIONARY_DIR = path.join(
  __dirname,
  "..",
  "..",
  "..",
  "data",
  "dictionary",
);

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on startup
 */
@injectable()
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;

  readonly dictionaryDir: string;
  readonly minMatchScore: number;
  readonly similarityWeights: SimilarityWeights;

  readonly orthodoxMode: boolean;

  readonly passageServiceUrl: string;
  readonly passageSourceLang: string;
  readonly passageTargetLang: string;
  readonly passageTimeoutMs: number;

  constructor() {
    this.port = parseInt(process.env.PORT || "3001", 10);
    this.nodeEnv = process.env.NODE_ENV || "development";
    this.logLevel = process.env.LOG_LEVEL || "info";

    this.dictionaryDir = process.env.DICTIONARY_DIR || DEFAULT_DICTIONARY_DIR;
    this.minMatchScore = parseNumber(process.env.MIN_MATCH_SCORE, 65);
    this.similarityWeights = {
      tokenSet: parseNumber(process.env.TOKEN_SET_WEIGHT, 0.3),
      tokenSort: parseNumber(process.env.TOKEN_SORT_WEIGHT, 0.3),
      partial: parseNumber(process.env.PARTIAL_WEIGHT, 0.2),
      ratio: parseNumber(process.env.RATIO_WEIGHT, 0.2),
    };

    this.orthodoxMode = parseBoolean(process.env.ORTHODOX_MODE, true);

    this.passageServiceUrl =
      process.env.PASSAGE_SERVICE_URL || DEFAULT_PASSAGE_SERVICE_URL;
    this.passageSourceLang = process.env.PASSAGE_SOURCE_LANG || "en";
    this.passageTargetLang = process.env.PASSAGE_TARGET_LANG || "hk";
    this.passageTimeoutMs = parseNumber(process.env.PASSAGE_TIMEOUT_MS, 15000);

    this.validate();
  }

  validate(): void {
    if (!Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
      throw new Error(`Invalid PORT: ${this.port}`);
    }

    if (this.minMatchScore < 0 || this.minMatchScore > 100) {
      throw new Error(
        `MIN_MATCH_SCORE must be between 0 and 100, got ${this.minMatchScore}`,
      );
    }

    const weights = Object.entries(this.similarityWeights);
    const negative = weights.filter(([, value]) => value < 0);
    if (negative.length > 0) {
      throw new Error(
        `Similarity weights must be non-negative: ${negative.map(([name]) => name).join(", ")}`,
      );
    }
    if (weights.every(([, value]) => value === 0)) {
      throw new Error("At least one similarity weight must be positive");
    }

    if (this.passageTimeoutMs < 1000) {
      throw new Error("PASSAGE_TIMEOUT_MS must be at least 1000ms");
    }

    try {
      new URL(this.passageServiceUrl);
    } catch {
      throw new Error(`Invalid PASSAGE_SERVICE_URL: ${this.passageServiceUrl}`);
    }
  }
}
