import { IConfig } from "../../shared/config/IConfig";
import { DEFAULT_SIMILARITY_WEIGHTS } from "../../terminology/similarity";

/**
 * Plain configuration for tests, independent of process.env
 */
export function testConfig(overrides: Partial<Omit<IConfig, "validate">> = {}): IConfig {
  return {
    port: 3001,
    nodeEnv: "test",
    logLevel: "silent",
    dictionaryDir: "./data/dictionary",
    minMatchScore: 65,
    similarityWeights: DEFAULT_SIMILARITY_WEIGHTS,
    orthodoxMode: true,
    passageServiceUrl: "https://passages.test/pericope",
    passageSourceLang: "en",
    passageTargetLang: "hk",
    passageTimeoutMs: 5000,
    ...overrides,
    validate: () => undefined,
  };
}
