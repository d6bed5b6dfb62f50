import { ILogger } from "../infrastructure/logging/ILogger";
import { Result, fail, ok } from "../shared/result";
import { IPassageClient, PassageFailure, PassageResult } from "./passageClient";
import { buildWhereExpression, parseReference } from "./referenceParser";
import { ResolvedPassage, ScriptureReference } from "./types";

export type ResolveFailure =
  | { reason: "UNPARSEABLE_REFERENCE"; message: string }
  | PassageFailure;

export type ResolveResult = Result<ResolvedPassage, ResolveFailure>;

/**
 * Scripture Reference Resolver
 *
 * Turns a human-readable citation into passage text in a given language
 */
export class ScriptureResolver {
  constructor(
    private readonly client: IPassageClient,
    private readonly logger: ILogger,
    private readonly defaultLang = "en",
  ) {}

  parse(citation: string): ScriptureReference | null {
    return parseReference(citation);
  }

  fetch(bookKey: string, whereExpr: string, lang: string): Promise<PassageResult> {
    return this.client.fetchPassage({ bookName: bookKey, lang, whereExpr });
  }

  async resolve(citation: string, lang = this.defaultLang): Promise<ResolveResult> {
    const reference = this.parse(citation);
    if (!reference) {
      this.logger.debug("Skipping unparseable reference", { citation });
      return fail({
        reason: "UNPARSEABLE_REFERENCE",
        message: `Could not parse Bible reference "${citation}"`,
      });
    }

    const passage = await this.fetch(
      reference.bookKey,
      buildWhereExpression(reference),
      lang,
    );
    if (!passage.success) {
      return passage;
    }

    return ok({ reference, lang, text: passage.value });
  }
}
