/**
 * Footnote Processor
 *
 * Resolves the parenthesized citations of annotated text and marks each
 * resolved one with [n] right after its first occurrence.
 */

import { ILogger } from "../infrastructure/logging/ILogger";
import { toError } from "../shared/errors/toError";
import { Result, fail, ok } from "../shared/result";
import { distinctReferences, extractReferences } from "./referenceExtractor";
import { ResolveResult, ScriptureResolver } from "./scriptureResolver";
import { Footnote, FootnotedText } from "./types";

export interface FootnoteFailure {
  reason: "FOOTNOTE_PROCESSING_FAILED";
  message: string;
}

export type FootnoteResult = Result<FootnotedText, FootnoteFailure>;

export function formatFootnotes(footnotes: readonly Footnote[]): string {
  return footnotes
    .map((footnote, i) => `[${i + 1}] ${footnote.reference}: ${footnote.text}`)
    .join("\n");
}

export class FootnoteProcessor {
  constructor(
    private readonly resolver: ScriptureResolver,
    private readonly logger: ILogger,
    private readonly lang = "en",
  ) {}

  async process(text: string): Promise<FootnoteResult> {
    const references = distinctReferences(extractReferences(text));

    let lookups: ResolveResult[];
    try {
      lookups = await Promise.all(
        references.map((ref) => this.resolver.resolve(ref.reference, this.lang)),
      );
    } catch (error) {
      const err = toError(error);
      this.logger.error("Footnote processing failed", err, {
        references: references.length,
      });
      return fail({
        reason: "FOOTNOTE_PROCESSING_FAILED",
        message: err.message,
      });
    }

    let annotatedText = text;
    const footnotes: Footnote[] = [];

    references.forEach((ref, i) => {
      const lookup = lookups[i];
      if (!lookup.success) {
        return;
      }

      const marker = `[${footnotes.length + 1}]`;
      const end = annotatedText.indexOf(ref.fullMatch) + ref.fullMatch.length;
      annotatedText = annotatedText.slice(0, end) + marker + annotatedText.slice(end);
      footnotes.push({ reference: ref.reference, text: lookup.value.text });
    });

    this.logger.info("Processed footnotes", {
      references: references.length,
      footnotes: footnotes.length,
    });

    return ok({ annotatedText, footnotes });
  }
}
