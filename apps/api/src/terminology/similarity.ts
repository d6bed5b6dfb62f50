/**
 * Composite String Similarity
 *
 * Scores a term against a span of text with four edit-distance based
 * algorithms and combines them into one weighted value in [0, 100]:
 * - token set:  word overlap, ignoring order and repetition
 * - token sort: full ratio after sorting the words of both sides
 * - partial:    best equal-length window of the longer string
 * - ratio:      plain indel ratio of the whole strings
 */

import { ValidationError } from "../shared/errors/DomainError";
import {
  CompositeScore,
  ScoreBreakdown,
  SimilarityAlgorithm,
  SimilarityWeights,
} from "./types";

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  tokenSet: 0.3,
  tokenSort: 0.3,
  partial: 0.2,
  ratio: 0.2,
};

const ALGORITHMS: SimilarityAlgorithm[] = [
  "tokenSet",
  "tokenSort",
  "partial",
  "ratio",
];

// Honorifics common in hagiography and liturgical texts
export const HONORIFIC_EXPANSIONS: Array<[RegExp, string]> = [
  [/\bSt\./gi, "Saint"],
  [/\bBl\./gi, "Blessed"],
  [/\bVen\./gi, "Venerable"],
  [/\bFr\./gi, "Father"],
  [/\bMt\./gi, "Mount"],
  [/\bMgr\./gi, "Monsignor"],
];

/**
 * Expand honorific abbreviations, case-fold, and reduce the text to
 * single-spaced alphanumeric words.
 */
export function preprocessText(text: string): string {
  let processed = text;
  for (const [pattern, replacement] of HONORIFIC_EXPANSIONS) {
    processed = processed.replace(pattern, `${replacement} `);
  }

  return processed
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Length of the longest common subsequence of two strings
 */
function longestCommonSubsequence(a: string[], b: string[]): number {
  let previous: number[] = new Array(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current: number[] = new Array(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Normalized indel similarity: 100 * 2 * LCS / (len(a) + len(b))
 */
export function ratio(a: string, b: string): number {
  const charsA = Array.from(a);
  const charsB = Array.from(b);
  if (charsA.length === 0 || charsB.length === 0) {
    return 0;
  }

  const lcs = longestCommonSubsequence(charsA, charsB);
  return (200 * lcs) / (charsA.length + charsB.length);
}

/**
 * Best ratio of the shorter string against every window of the longer
 * string that has the same length
 */
export function partialRatio(a: string, b: string): number {
  const charsA = Array.from(a);
  const charsB = Array.from(b);
  const [shorter, longer] =
    charsA.length <= charsB.length ? [charsA, charsB] : [charsB, charsA];

  if (shorter.length === 0) {
    return 0;
  }

  const needle = shorter.join("");
  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const window = longer.slice(start, start + shorter.length).join("");
    best = Math.max(best, ratio(needle, window));
    if (best === 100) break;
  }

  return best;
}

export function tokenSortRatio(a: string, b: string): number {
  const sortedA = tokenize(a).sort().join(" ");
  const sortedB = tokenize(b).sort().join(" ");
  return ratio(sortedA, sortedB);
}

export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(tokenize(a));
  const tokensB = new Set(tokenize(b));
  if (tokensA.size === 0 || tokensB.size === 0) {
    return 0;
  }

  const intersection = [...tokensA].filter((token) => tokensB.has(token)).sort();
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token)).sort();
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token)).sort();

  // One side is contained in the other
  if (intersection.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 100;
  }

  const shared = intersection.join(" ");
  const combinedA = [shared, onlyA.join(" ")].filter(Boolean).join(" ");
  const combinedB = [shared, onlyB.join(" ")].filter(Boolean).join(" ");

  const scores = [ratio(combinedA, combinedB)];
  if (shared) {
    scores.push(ratio(shared, combinedA), ratio(shared, combinedB));
  }

  return Math.max(...scores);
}

const SCORERS: Record<SimilarityAlgorithm, (a: string, b: string) => number> = {
  tokenSet: tokenSetRatio,
  tokenSort: tokenSortRatio,
  partial: partialRatio,
  ratio,
};

export interface ScoredText {
  text: string;
  score: number;
}

export interface DetailedScoredText extends ScoredText {
  breakdown: ScoreBreakdown;
}

/**
 * Weighted combination of the four similarity algorithms
 */
export class SimilarityEngine {
  readonly weights: SimilarityWeights;

  constructor(weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS) {
    const negative = ALGORITHMS.filter((name) => weights[name] < 0);
    if (negative.length > 0) {
      throw new ValidationError(
        `Similarity weights must be non-negative: ${negative.join(", ")}`,
        "weights",
      );
    }

    const total = ALGORITHMS.reduce((sum, name) => sum + weights[name], 0);
    if (total <= 0) {
      throw new ValidationError(
        "At least one similarity weight must be positive",
        "weights",
      );
    }

    this.weights = {
      tokenSet: weights.tokenSet / total,
      tokenSort: weights.tokenSort / total,
      partial: weights.partial / total,
      ratio: weights.ratio / total,
    };
  }

  compositeScore(term: string, text: string): CompositeScore {
    const cleanTerm = preprocessText(term);
    const cleanText = preprocessText(text);

    const breakdown: ScoreBreakdown = {
      tokenSet: 0,
      tokenSort: 0,
      partial: 0,
      ratio: 0,
    };
    let score = 0;

    for (const name of ALGORITHMS) {
      // Zero-weight algorithms are skipped entirely
      if (this.weights[name] === 0) continue;
      breakdown[name] = SCORERS[name](cleanTerm, cleanText);
      score += breakdown[name] * this.weights[name];
    }

    return { score, breakdown };
  }

  /**
   * Token-set similarity on preprocessed input, the single-algorithm score
   * used when scanning text for dictionary terms
   */
  tokenSetScore(term: string, text: string): number {
    return tokenSetRatio(preprocessText(term), preprocessText(text));
  }

  findBestMatches(
    term: string,
    texts: readonly string[],
    options: { minScore: number; limit?: number },
  ): DetailedScoredText[] {
    const limit = options.limit ?? 5;
    const results: DetailedScoredText[] = [];

    for (const text of texts) {
      const { score, breakdown } = this.compositeScore(term, text);
      if (score >= options.minScore) {
        results.push({ text, score, breakdown });
      }
    }

    results.sort((a, b) => b.score - a.score);
    return results.slice(0, limit);
  }

  bulkExtract(
    terms: readonly string[],
    texts: readonly string[],
    options: { minScore: number; limitPerTerm?: number },
  ): Record<string, ScoredText[]> {
    const results: Record<string, ScoredText[]> = {};

    for (const term of terms) {
      results[term] = this.findBestMatches(term, texts, {
        minScore: options.minScore,
        limit: options.limitPerTerm ?? 3,
      }).map(({ text, score }) => ({ text, score }));
    }

    return results;
  }
}
