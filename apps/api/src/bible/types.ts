/**
 * Bible Types and Interfaces
 */

export interface ScriptureReference {
  raw: string; // Citation without surrounding parentheses, e.g. "John 1:2-5"
  bookKey: string; // Passage-service book identifier, e.g. "john", "1cor"
  chapter: number;
  verseStart: number;
  verseEnd: number;
}

export interface ExtractedReference {
  reference: string; // "1 Cor 13:4"
  fullMatch: string; // "(1 Cor 13:4)"
  index: number;
}

export interface PassageQuery {
  bookName: string;
  lang: string;
  whereExpr: string;
}

export interface ResolvedPassage {
  reference: ScriptureReference;
  lang: string;
  text: string;
}

export interface Footnote {
  reference: string;
  text: string;
}

export interface FootnotedText {
  annotatedText: string;
  footnotes: Footnote[];
}
