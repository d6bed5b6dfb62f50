/**
 * Command classification for user messages
 *
 * A message is a command only when it starts with a keyword:
 *   "add footnotes <annotated text>"
 *   "annotate <text>"
 *   "translate <text>"       (Orthodox or standard, depending on the mode)
 * Anything else is a normal chat message.
 */

import { HONORIFIC_EXPANSIONS } from "../../terminology/similarity";

export type TranslationMode = "orthodox" | "standard";

export type Command =
  | { kind: "normal" }
  | { kind: "translate"; mode: TranslationMode; payload: string }
  | { kind: "annotate"; payload: string }
  | { kind: "add_footnotes"; payload: string };

export type CommandType =
  | "normal"
  | "translate_orthodox"
  | "translate_standard"
  | "annotate"
  | "add_footnotes";

export interface ClassifyOptions {
  orthodoxMode: boolean;
}

type KeywordCommand = "add_footnotes" | "annotate" | "translate";

// Checked in order; "add footnotes" may be written with any spacing
const KEYWORDS: Array<[KeywordCommand, RegExp]> = [
  ["add_footnotes", /^add\s+footnotes(?![\p{L}\p{N}_])/iu],
  ["annotate", /^annotate(?![\p{L}\p{N}_])/iu],
  ["translate", /^translate(?![\p{L}\p{N}_])/iu],
];

const SEPARATOR = /[:.,\-;]/;

// Words allowed between a keyword and its separator, e.g.
// "translate to traditional Chinese: ..."
const MAX_COMMAND_PHRASE_WORDS = 4;

// A phrase without a colon is a command phrase only when it names a direction
const DIRECTION_WORDS = new Set(["to", "into", "from", "as"]);

const HONORIFIC_AT_END = HONORIFIC_EXPANSIONS.map(
  ([pattern]) => new RegExp(`${pattern.source}$`, "i"),
);

function isCommandPhrase(phrase: string, separator: string): boolean {
  const words = phrase.split(/\s+/).filter(Boolean);
  if (words.length === 0 || words.length > MAX_COMMAND_PHRASE_WORDS) {
    return false;
  }
  return separator === ":" || DIRECTION_WORDS.has(words[0].toLowerCase());
}

/**
 * Split the text after a keyword into payload.
 *
 * "translate: Hello"            -> "Hello"
 * "translate to Chinese: Hello" -> "Hello"
 * "translate to Chinese\nHello" -> "Hello"
 * "translate hello"             -> "hello"
 * "translate Glory to God, amen" -> "Glory to God, amen"
 */
export function extractPayload(afterKeyword: string): string {
  const leading = afterKeyword.match(/^[ \t]*([:.,\-;\n])/);
  if (leading) {
    return afterKeyword.slice(leading[0].length).trim();
  }

  const lineEnd = afterKeyword.indexOf("\n");
  const firstLine = lineEnd === -1 ? afterKeyword : afterKeyword.slice(0, lineEnd);

  for (let i = 0; i < firstLine.length; i++) {
    const char = firstLine[i];
    if (!SEPARATOR.test(char)) continue;

    const next = afterKeyword[i + 1];
    if (next !== undefined && !/\s/.test(next)) continue;

    // "St. Basil" is text, not a separator
    const upToSeparator = afterKeyword.slice(0, i + 1);
    if (char === "." && HONORIFIC_AT_END.some((pattern) => pattern.test(upToSeparator))) {
      continue;
    }

    return isCommandPhrase(afterKeyword.slice(0, i), char)
      ? afterKeyword.slice(i + 1).trim()
      : afterKeyword.trim();
  }

  if (lineEnd !== -1 && isCommandPhrase(firstLine, "\n")) {
    return afterKeyword.slice(lineEnd + 1).trim();
  }

  return afterKeyword.trim();
}

export function classifyCommand(message: string, options: ClassifyOptions): Command {
  const trimmed = message.trim();

  for (const [kind, pattern] of KEYWORDS) {
    const match = trimmed.match(pattern);
    if (!match) continue;

    const payload = extractPayload(trimmed.slice(match[0].length));
    switch (kind) {
      case "add_footnotes":
        return { kind, payload };
      case "annotate":
        return { kind, payload };
      case "translate":
        return {
          kind,
          mode: options.orthodoxMode ? "orthodox" : "standard",
          payload,
        };
    }
  }

  return { kind: "normal" };
}

export function commandType(command: Command): CommandType {
  switch (command.kind) {
    case "translate":
      return command.mode === "orthodox" ? "translate_orthodox" : "translate_standard";
    default:
      return command.kind;
  }
}
