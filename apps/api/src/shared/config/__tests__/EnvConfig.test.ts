import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs";
import path from "path";
import {
  EnvConfig,
  DEFAULT_DICTIONARY_DIR,
  DEFAULT_PASSAGE_SERVICE_URL,
} from "../EnvConfig";

const KEYS = [
  "PORT",
  "MIN_MATCH_SCORE",
  "TOKEN_SET_WEIGHT",
  "TOKEN_SORT_WEIGHT",
  "PARTIAL_WEIGHT",
  "RATIO_WEIGHT",
  "ORTHODOX_MODE",
  "PASSAGE_SERVICE_URL",
  "PASSAGE_SOURCE_LANG",
  "PASSAGE_TARGET_LANG",
  "PASSAGE_TIMEOUT_MS",
  "DICTIONARY_DIR",
];

describe("EnvConfig", () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("should apply defaults", () => {
    const config = new EnvConfig();

    expect(config.port).toBe(3001);
    expect(config.minMatchScore).toBe(65);
    expect(config.similarityWeights).toEqual({
      tokenSet: 0.3,
      tokenSort: 0.3,
      partial: 0.2,
      ratio: 0.2,
    });
    expect(config.orthodoxMode).toBe(true);
    expect(config.passageServiceUrl).toBe(DEFAULT_PASSAGE_SERVICE_URL);
    expect(config.passageSourceLang).toBe("en");
    expect(config.passageTargetLang).toBe("hk");
    expect(config.passageTimeoutMs).toBe(15000);
  });

  it("should read overrides from the environment", () => {
    process.env.ORTHODOX_MODE = "false";
    process.env.MIN_MATCH_SCORE = "80";
    process.env.DICTIONARY_DIR = "/srv/dictionary";

    const config = new EnvConfig();

    expect(config.orthodoxMode).toBe(false);
    expect(config.minMatchScore).toBe(80);
    expect(config.dictionaryDir).toBe("/srv/dictionary");
  });

  it("should default to the bundled dictionary directory", () => {
    const config = new EnvConfig();

    expect(config.dictionaryDir).toBe(DEFAULT_DICTIONARY_DIR);
    expect(path.basename(config.dictionaryDir)).toBe("dictionary");
    expect(fs.existsSync(path.join(config.dictionaryDir, "liturgy.jsonl"))).toBe(true);
  });

  it("should reject a threshold outside 0-100", () => {
    process.env.MIN_MATCH_SCORE = "120";

    expect(() => new EnvConfig()).toThrow("MIN_MATCH_SCORE must be between 0 and 100, got 120");
  });

  it("should reject negative or all-zero weights", () => {
    process.env.RATIO_WEIGHT = "-0.1";
    expect(() => new EnvConfig()).toThrow("Similarity weights must be non-negative: ratio");

    process.env.TOKEN_SET_WEIGHT = "0";
    process.env.TOKEN_SORT_WEIGHT = "0";
    process.env.PARTIAL_WEIGHT = "0";
    process.env.RATIO_WEIGHT = "0";
    expect(() => new EnvConfig()).toThrow("At least one similarity weight must be positive");
  });

  it("should reject an invalid passage service URL", () => {
    process.env.PASSAGE_SERVICE_URL = "not a url";

    expect(() => new EnvConfig()).toThrow("Invalid PASSAGE_SERVICE_URL: not a url");
  });

  it("should reject a timeout below one second", () => {
    process.env.PASSAGE_TIMEOUT_MS = "10";

    expect(() => new EnvConfig()).toThrow("PASSAGE_TIMEOUT_MS must be at least 1000ms");
  });
});
