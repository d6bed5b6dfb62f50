/**
 * Bible Reference Parser
 *
 * Parses citations of the form "<book> <chapter>:<verse>[-<verse>]":
 * - "John 1:2-5"
 * - "(1 Cor 13:4)"
 * - "II Timothy 3:16"
 *
 * Book names map to the passage service's book keys through the alias
 * table in bookAliases.json.
 */

import bookAliases from "./bookAliases.json";
import { ScriptureReference } from "./types";

const BOOK_ALIASES: Record<string, string> = bookAliases;

const REFERENCE_PATTERN = /^([\w\s]+?)\s+(\d+)\s*:\s*(\d+)(?:\s*-\s*(\d+))?/;

/**
 * Normalize a book name to its passage-service key
 *
 * Known names and abbreviations come from the alias table; anything else
 * falls back to the lowercase name with whitespace removed.
 */
export function normalizeBookName(input: string): string {
  const lower = input.toLowerCase().trim().replace(/\s+/g, " ");

  if (Object.hasOwn(BOOK_ALIASES, lower)) {
    return BOOK_ALIASES[lower];
  }

  return lower.replace(/\s/g, "");
}

/**
 * Parse a citation into a structured reference
 *
 * Examples:
 * - "John 1:2-5" -> { bookKey: "john", chapter: 1, verseStart: 2, verseEnd: 5 }
 * - "1 Corinthians 13:4" -> { bookKey: "1cor", chapter: 13, verseStart: 4, verseEnd: 4 }
 *
 * Returns null if the citation does not match the pattern.
 */
export function parseReference(citation: string): ScriptureReference | null {
  let raw = citation.trim();
  if (raw.startsWith("(") && raw.endsWith(")")) {
    raw = raw.slice(1, -1).trim();
  }

  const match = raw.match(REFERENCE_PATTERN);
  if (!match) {
    return null;
  }

  const chapter = parseInt(match[2], 10);
  const verseStart = parseInt(match[3], 10);
  const verseEnd = match[4] ? parseInt(match[4], 10) : verseStart;

  if (chapter < 1 || verseStart < 1 || verseEnd < verseStart) {
    return null;
  }

  return {
    raw,
    bookKey: normalizeBookName(match[1]),
    chapter,
    verseStart,
    verseEnd,
  };
}

/**
 * Passage-service filter selecting the reference's verses
 */
export function buildWhereExpression(reference: ScriptureReference): string {
  return `chapter=${reference.chapter} AND verse>=${reference.verseStart} AND verse<=${reference.verseEnd}`;
}

/**
 * Test if input is a parseable reference
 */
export function isParseableReference(input: string): boolean {
  return parseReference(input) !== null;
}
