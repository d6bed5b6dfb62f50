/**
 * Terminology Types and Interfaces
 */

export type SimilarityAlgorithm = "tokenSet" | "tokenSort" | "partial" | "ratio";

export type SimilarityWeights = Record<SimilarityAlgorithm, number>;

export type ScoreBreakdown = Record<SimilarityAlgorithm, number>;

export interface CompositeScore {
  score: number;
  breakdown: ScoreBreakdown;
}

export interface TerminologyEntry {
  term: string;
  translations: readonly string[];
}

export interface MatchResult extends TerminologyEntry {
  score: number;
}

export interface MatchOptions {
  minScore: number;
}

export interface DictionaryLoadReport {
  files: number;
  terms: number;
  skippedLines: number;
}
