import { describe, it, expect } from "@jest/globals";
import {
  countMatches,
  formatResults,
  matchTerms,
  parseFuzzyMatchArgs,
  readLines,
} from "../fuzzyMatch";
import { DEFAULT_SIMILARITY_WEIGHTS } from "../../terminology/similarity";
import { ValidationError } from "../../shared/errors/DomainError";

describe("parseFuzzyMatchArgs", () => {
  it("should apply defaults", () => {
    expect(parseFuzzyMatchArgs(["source.txt", "terms.txt"])).toEqual({
      sourceFile: "source.txt",
      terminologyFile: "terms.txt",
      minScore: 80,
      limit: 3,
      output: undefined,
      format: "json",
      weights: DEFAULT_SIMILARITY_WEIGHTS,
    });
  });

  it("should read flags in both spellings", () => {
    const options = parseFuzzyMatchArgs([
      "source.txt",
      "--min-score",
      "75",
      "terms.txt",
      "--limit=5",
      "-o",
      "out.txt",
      "--format",
      "text",
      "--ratio-weight",
      "0",
    ]);

    expect(options.minScore).toBe(75);
    expect(options.limit).toBe(5);
    expect(options.output).toBe("out.txt");
    expect(options.format).toBe("text");
    expect(options.weights).toEqual({ tokenSet: 0.3, tokenSort: 0.3, partial: 0.2, ratio: 0 });
    expect([options.sourceFile, options.terminologyFile]).toEqual(["source.txt", "terms.txt"]);
  });

  it("should require both files", () => {
    expect(() => parseFuzzyMatchArgs(["source.txt"])).toThrow(
      "Expected exactly two arguments: <source_file> <terminology_file>",
    );
  });

  it("should reject unknown options and missing values", () => {
    expect(() => parseFuzzyMatchArgs(["a", "b", "--bogus", "1"])).toThrow(
      "Unknown option: --bogus",
    );
    expect(() => parseFuzzyMatchArgs(["a", "b", "--limit"])).toThrow(
      "Missing value for --limit",
    );
  });

  it("should reject invalid values", () => {
    expect(() => parseFuzzyMatchArgs(["a", "b", "--min-score", "abc"])).toThrow(ValidationError);
    expect(() => parseFuzzyMatchArgs(["a", "b", "--min-score", "101"])).toThrow(ValidationError);
    expect(() => parseFuzzyMatchArgs(["a", "b", "--format", "xml"])).toThrow(ValidationError);
  });
});

describe("readLines", () => {
  it("should keep trimmed non-empty lines", () => {
    expect(readLines("  Theotokos \n\n Pascha\r\n")).toEqual(["Theotokos", "Pascha"]);
  });
});

describe("matchTerms", () => {
  it("should score terms against lines and drop terms without matches", () => {
    const results = matchTerms(
      ["Theotokos", "Pascha", "Vespers"],
      ["The Theotokos", "Holy Pascha", "Icon"],
      { minScore: 80, limit: 3, weights: DEFAULT_SIMILARITY_WEIGHTS },
    );

    expect(Object.keys(results)).toEqual(["Theotokos", "Pascha"]);
    expect(results.Theotokos[0].text).toBe("The Theotokos");
    expect(results.Theotokos[0].score).toBeCloseTo(90.91, 1);
    expect(results.Pascha[0].text).toBe("Holy Pascha");
    expect(results.Pascha[0].score).toBeCloseTo(85.29, 1);
    expect(countMatches(results)).toBe(2);
  });
});

describe("formatResults", () => {
  const results = {
    Pascha: [{ text: "Holy Pascha", score: 85.26 }],
    Icon: [{ text: "Icon", score: 100 }],
  };

  it("should render text output per term", () => {
    expect(formatResults(results, "text")).toBe(
      "🔍 'Pascha' matches:\n  📍 85.3% - 'Holy Pascha'\n\n🔍 'Icon' matches:\n  📍 100.0% - 'Icon'",
    );
  });

  it("should render JSON output", () => {
    expect(JSON.parse(formatResults(results, "json"))).toEqual(results);
  });
});
