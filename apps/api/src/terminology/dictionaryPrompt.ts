import { TerminologyEntry } from "./types";

const DICTIONARY_HEADER =
  "When translating the text, you MUST use the following dictionary of special Orthodox Christian terms:";

const DICTIONARY_FOOTER =
  "These translations for specialized Orthodox terms are authoritative and must be used exactly as provided.";

function formatEntry(entry: TerminologyEntry): string {
  if (entry.translations.length === 1) {
    return `- "${entry.term}": "${entry.translations[0]}"`;
  }

  const alternatives = entry.translations
    .map((translation) => `"${translation}"`)
    .join(" / ");
  return `- "${entry.term}": one of ${alternatives} (choose the translation that best fits the context)`;
}

/**
 * Render dictionary entries as an instruction block for the model.
 * An empty list renders to an empty string so callers can concatenate
 * the result unconditionally.
 */
export function buildDictionaryPrompt(
  entries: readonly TerminologyEntry[],
): string {
  const usable = entries.filter((entry) => entry.translations.length > 0);
  if (usable.length === 0) {
    return "";
  }

  const lines = usable.map(formatEntry).join("\n");
  return `\n${DICTIONARY_HEADER}\n\n${lines}\n\n${DICTIONARY_FOOTER}\n`;
}
