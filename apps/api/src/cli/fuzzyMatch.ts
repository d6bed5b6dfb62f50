/**
 * Bulk fuzzy matching of a term list against source lines
 *
 * Backs scripts/fuzzy-match.ts. Kept free of process and console access
 * so the argument handling and output formats can be tested directly.
 */

import { z } from "zod";
import { ValidationError } from "../shared/errors/DomainError";
import { DEFAULT_SIMILARITY_WEIGHTS, ScoredText, SimilarityEngine } from "../terminology/similarity";
import { SimilarityWeights } from "../terminology/types";

export type OutputFormat = "json" | "text";

export interface FuzzyMatchOptions {
  sourceFile: string;
  terminologyFile: string;
  minScore: number;
  limit: number;
  output?: string;
  format: OutputFormat;
  weights: SimilarityWeights;
}

export type FuzzyMatchResults = Record<string, ScoredText[]>;

export const USAGE = `Usage: fuzzy-match <source_file> <terminology_file> [options]

Options:
  --min-score N           Minimum similarity score (0-100, default: 80)
  --limit N               Maximum matches per term (default: 3)
  --output, -o FILE       Output file (default: print to console)
  --format json|text      Output format (default: json)
  --token-set-weight W    Weight for token set ratio (default: 0.3)
  --token-sort-weight W   Weight for token sort ratio (default: 0.3)
  --partial-weight W      Weight for partial ratio (default: 0.2)
  --ratio-weight W        Weight for basic ratio (default: 0.2)`;

const FLAGS = new Set([
  "min-score",
  "limit",
  "output",
  "format",
  "token-set-weight",
  "token-sort-weight",
  "partial-weight",
  "ratio-weight",
]);

const numeric = z.coerce.number({ invalid_type_error: "must be a number" });

const optionsSchema = z.object({
  "min-score": numeric.int().min(0).max(100).default(80),
  limit: numeric.int().min(1).default(3),
  output: z.string().min(1).optional(),
  format: z.enum(["json", "text"]).default("json"),
  "token-set-weight": numeric.min(0).default(DEFAULT_SIMILARITY_WEIGHTS.tokenSet),
  "token-sort-weight": numeric.min(0).default(DEFAULT_SIMILARITY_WEIGHTS.tokenSort),
  "partial-weight": numeric.min(0).default(DEFAULT_SIMILARITY_WEIGHTS.partial),
  "ratio-weight": numeric.min(0).default(DEFAULT_SIMILARITY_WEIGHTS.ratio),
});

/**
 * Accepts `--flag value`, `--flag=value` and `-o value`
 */
export function parseFuzzyMatchArgs(argv: readonly string[]): FuzzyMatchOptions {
  const positional: string[] = [];
  const raw: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    let key: string;
    let value: string | undefined;
    if (arg === "-o") {
      key = "output";
    } else if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      value = eq === -1 ? undefined : arg.slice(eq + 1);
    } else {
      throw new ValidationError(`Unknown option: ${arg}`);
    }

    if (!FLAGS.has(key)) {
      throw new ValidationError(`Unknown option: --${key}`);
    }
    if (value === undefined) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new ValidationError(`Missing value for --${key}`, key);
    }
    raw[key] = value;
  }

  if (positional.length !== 2) {
    throw new ValidationError(
      "Expected exactly two arguments: <source_file> <terminology_file>",
    );
  }

  const parsed = optionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(`--${field}: ${issue.message}`, field);
  }

  const options = parsed.data;
  return {
    sourceFile: positional[0],
    terminologyFile: positional[1],
    minScore: options["min-score"],
    limit: options.limit,
    output: options.output,
    format: options.format,
    weights: {
      tokenSet: options["token-set-weight"],
      tokenSort: options["token-sort-weight"],
      partial: options["partial-weight"],
      ratio: options["ratio-weight"],
    },
  };
}

/**
 * Non-empty trimmed lines
 */
export function readLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Score every term against every line; terms without a match are dropped
 */
export function matchTerms(
  terms: readonly string[],
  texts: readonly string[],
  options: Pick<FuzzyMatchOptions, "minScore" | "limit" | "weights">,
): FuzzyMatchResults {
  const engine = new SimilarityEngine(options.weights);
  const results = engine.bulkExtract(terms, texts, {
    minScore: options.minScore,
    limitPerTerm: options.limit,
  });

  return Object.fromEntries(
    Object.entries(results).filter(([, matches]) => matches.length > 0),
  );
}

export function countMatches(results: FuzzyMatchResults): number {
  return Object.values(results).reduce((total, matches) => total + matches.length, 0);
}

export function formatResults(results: FuzzyMatchResults, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(results, null, 2);
  }

  return Object.entries(results)
    .map(([term, matches]) =>
      [
        `🔍 '${term}' matches:`,
        ...matches.map(({ text, score }) => `  📍 ${score.toFixed(1)}% - '${text}'`),
      ].join("\n"),
    )
    .join("\n\n");
}
