/**
 * Orthodox Terminology Dictionary
 *
 * Loads English → target-language term pairs from a directory of JSONL
 * files and finds the terms used in a piece of text with three strategies,
 * in priority order per sentence:
 *   1. direct substring (score 100)
 *   2. every word of a multi-word term present in any order (score 90)
 *   3. token-set similarity at or above the caller's minimum score
 */

import fs from "fs/promises";
import path from "path";
import { ILogger } from "../infrastructure/logging/ILogger";
import { ValidationError } from "../shared/errors/DomainError";
import { toError } from "../shared/errors/toError";
import { buildDictionaryPrompt } from "./dictionaryPrompt";
import { SimilarityEngine } from "./similarity";
import {
  DictionaryLoadReport,
  MatchOptions,
  MatchResult,
  TerminologyEntry,
} from "./types";

export const DIRECT_MATCH_SCORE = 100;
export const WORD_SET_MATCH_SCORE = 90;

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

function wordsOf(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse one JSONL line of the form {"<term>": "<translation>"}.
 * Returns null when the line carries no usable pair.
 */
export function parseTerminologyLine(line: string): Array<[string, string]> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const pairs: Array<[string, string]> = [];
  for (const [rawTerm, rawTranslation] of Object.entries(parsed)) {
    if (typeof rawTranslation !== "string") continue;
    const term = rawTerm.trim();
    const translation = rawTranslation.trim();
    if (term && translation) {
      pairs.push([term, translation]);
    }
  }

  return pairs.length > 0 ? pairs : null;
}

/**
 * Split text into trimmed, non-empty sentences on . ! ?
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export class TerminologyDictionary {
  private readonly entries = new Map<string, string[]>();

  constructor(
    private readonly similarity: SimilarityEngine,
    private readonly logger: ILogger,
  ) {}

  static fromRecords(
    records: ReadonlyArray<readonly [string, string]>,
    similarity: SimilarityEngine,
    logger: ILogger,
  ): TerminologyDictionary {
    const dictionary = new TerminologyDictionary(similarity, logger);
    for (const [term, translation] of records) {
      dictionary.addTranslation(term, translation);
    }
    return dictionary;
  }

  get size(): number {
    return this.entries.size;
  }

  terms(): string[] {
    return [...this.entries.keys()];
  }

  lookup(term: string): TerminologyEntry | undefined {
    const wanted = term.trim().toLowerCase();
    for (const [key, translations] of this.entries) {
      if (key.toLowerCase() === wanted) {
        return { term: key, translations: [...translations] };
      }
    }
    return undefined;
  }

  /**
   * Add a translation for a term, keeping translations unique and in
   * insertion order. Returns false when the pair was already known.
   */
  addTranslation(term: string, translation: string): boolean {
    const key = term.trim();
    const value = translation.trim();
    if (!key || !value) {
      return false;
    }

    const translations = this.entries.get(key);
    if (!translations) {
      this.entries.set(key, [value]);
      return true;
    }
    if (translations.includes(value)) {
      return false;
    }
    translations.push(value);
    return true;
  }

  /**
   * Load every *.jsonl file in a directory. Unreadable directories and
   * files are logged and skipped; the dictionary keeps whatever loaded.
   */
  async load(dir: string): Promise<DictionaryLoadReport> {
    const report: DictionaryLoadReport = { files: 0, terms: 0, skippedLines: 0 };

    let fileNames: string[];
    try {
      fileNames = (await fs.readdir(dir))
        .filter((name) => name.endsWith(".jsonl"))
        .sort();
    } catch (error) {
      this.logger.warn("Terminology directory could not be read", {
        dir,
        reason: toError(error).message,
      });
      return report;
    }

    if (fileNames.length === 0) {
      this.logger.warn("No .jsonl files found in terminology directory", { dir });
      return report;
    }

    for (const fileName of fileNames) {
      const filePath = path.join(dir, fileName);
      let content: string;
      try {
        content = await fs.readFile(filePath, "utf-8");
      } catch (error) {
        this.logger.error("Failed to read dictionary file", toError(error), {
          file: filePath,
        });
        continue;
      }

      report.files++;
      this.logger.debug("Loading dictionary file", { file: filePath });

      for (const line of content.split(/\r?\n/)) {
        if (!line.trim()) continue;

        const pairs = parseTerminologyLine(line);
        if (!pairs) {
          report.skippedLines++;
          continue;
        }
        for (const [term, translation] of pairs) {
          this.addTranslation(term, translation);
        }
      }
    }

    report.terms = this.entries.size;
    this.logger.info("Loaded terminology dictionary", { dir, ...report });
    return report;
  }

  /**
   * Find dictionary terms in the text. One result per term with its best
   * score across sentences, sorted by descending score.
   */
  findMatches(text: string, options: MatchOptions): MatchResult[] {
    const { minScore } = options;
    if (!Number.isFinite(minScore) || minScore < 0 || minScore > 100) {
      throw new ValidationError(
        `Minimum score must be between 0 and 100, got ${minScore}`,
        "minScore",
      );
    }

    const bestScores = new Map<string, number>();
    for (const sentence of splitSentences(text)) {
      for (const [term, score] of this.matchSentence(sentence, minScore)) {
        const previous = bestScores.get(term);
        if (previous === undefined || score > previous) {
          bestScores.set(term, score);
        }
      }
    }

    const results: MatchResult[] = [];
    for (const [term, translations] of this.entries) {
      const score = bestScores.get(term);
      if (score !== undefined) {
        results.push({ term, translations: [...translations], score });
      }
    }

    // Array.prototype.sort is stable, so ties keep dictionary order
    return results.sort((a, b) => b.score - a.score);
  }

  buildPrompt(entries: readonly TerminologyEntry[]): string {
    return buildDictionaryPrompt(entries);
  }

  private matchSentence(sentence: string, minScore: number): Map<string, number> {
    const matches = new Map<string, number>();
    const lowerSentence = sentence.toLowerCase();
    const sentenceWords = new Set(wordsOf(sentence));

    for (const term of this.entries.keys()) {
      if (lowerSentence.includes(term.toLowerCase())) {
        matches.set(term, DIRECT_MATCH_SCORE);
      }
    }

    for (const term of this.entries.keys()) {
      if (matches.has(term)) continue;

      const termWords = wordsOf(term);
      if (termWords.length > 1 && termWords.every((word) => sentenceWords.has(word))) {
        matches.set(term, WORD_SET_MATCH_SCORE);
      }
    }

    for (const term of this.entries.keys()) {
      if (matches.has(term)) continue;

      const score = this.similarity.tokenSetScore(term, sentence);
      if (score >= minScore) {
        matches.set(term, score);
      }
    }

    return matches;
  }
}
