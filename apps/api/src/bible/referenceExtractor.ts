import { ExtractedReference } from "./types";

// "(John 1:2-5)", "(1 Cor 13 : 4)"
const PARENTHESIZED_REFERENCE =
  /\(([\w\s]+?\s+\d+\s*:\s*\d+(?:\s*-\s*\d+)?)\)/g;

/**
 * Find every parenthesized Bible reference in source order.
 * Repeated citations are reported once per occurrence.
 */
export function extractReferences(text: string): ExtractedReference[] {
  return Array.from(text.matchAll(PARENTHESIZED_REFERENCE), (match) => ({
    reference: match[1],
    fullMatch: match[0],
    index: match.index ?? 0,
  }));
}

/**
 * First occurrence of each distinct parenthesized citation
 */
export function distinctReferences(
  references: readonly ExtractedReference[],
): ExtractedReference[] {
  const seen = new Set<string>();
  return references.filter((ref) => {
    if (seen.has(ref.fullMatch)) return false;
    seen.add(ref.fullMatch);
    return true;
  });
}
