import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  ChatMessage,
  ProcessMessageDto,
  ProcessedQueryDto,
} from "../dto/ProcessMessageDto";
import { Command, classifyCommand, commandType } from "../commands";
import { TerminologyDictionary } from "../../../terminology/dictionary";
import { TerminologyEntry } from "../../../terminology/types";
import { ResolveResult, ScriptureResolver } from "../../../bible/scriptureResolver";
import { FootnoteProcessor, formatFootnotes } from "../../../bible/footnoteProcessor";
import { distinctReferences, extractReferences } from "../../../bible/referenceExtractor";
import { IConfig } from "../../../shared/config/IConfig";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";
import { toError } from "../../../shared/errors/toError";
import {
  ANNOTATION_CLARIFICATION,
  BIBLE_ANNOTATION_PROMPT,
  FOOTNOTES_CLARIFICATION,
  FOOTNOTES_NONE_RESOLVED,
  FOOTNOTES_PROMPT,
  MAX_QUOTE_LENGTH,
  ORTHODOX_TRANSLATION_PROMPT,
  ORTHODOX_TRANSLATION_REQUEST,
  STANDARD_TRANSLATION_PROMPT,
  TRANSLATION_CLARIFICATION,
  footnotesErrorPrompt,
} from "../../../config/prompts";

export function truncateQuote(text: string, maxLength = MAX_QUOTE_LENGTH): string {
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join("")}...` : text;
}

/**
 * Process User Message Use Case
 *
 * Classifies a user turn and assembles the prompt that is sent to the
 * model in its place. Augmentation (dictionary, Bible quotes, footnotes)
 * is best-effort: lookup failures reduce it but never fail the turn.
 */
@injectable()
export class ProcessUserMessageUseCase
  implements IUseCase<ProcessMessageDto, ProcessedQueryDto>
{
  constructor(
    @inject(TYPES.TerminologyDictionary)
    private dictionary: TerminologyDictionary,

    @inject(TYPES.ScriptureResolver)
    private resolver: ScriptureResolver,

    @inject(TYPES.FootnoteProcessor)
    private footnoteProcessor: FootnoteProcessor,

    @inject(TYPES.Config)
    private config: IConfig,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(dto: ProcessMessageDto): Promise<ProcessedQueryDto> {
    const orthodoxMode = dto.orthodoxMode ?? this.config.orthodoxMode;
    const minScore = dto.minScore ?? this.config.minMatchScore;

    const command = classifyCommand(dto.message, { orthodoxMode });
    const prompt = await this.buildPrompt(command, dto.message, minScore);

    this.logger.info("Processed user message", {
      command: commandType(command),
      augmented: prompt !== dto.message,
    });

    const messages: ReadonlyArray<Readonly<ChatMessage>> = Object.freeze([
      ...dto.history.map((message) => Object.freeze({ ...message })),
      Object.freeze({ role: "user" as const, content: prompt }),
    ]);

    return Object.freeze({ command: commandType(command), prompt, messages });
  }

  private async buildPrompt(
    command: Command,
    message: string,
    minScore: number,
  ): Promise<string> {
    switch (command.kind) {
      case "normal":
        return message;

      case "annotate":
        return `${BIBLE_ANNOTATION_PROMPT}\n\n${command.payload || ANNOTATION_CLARIFICATION}`;

      case "add_footnotes":
        return command.payload
          ? this.footnotesPrompt(command.payload)
          : `${FOOTNOTES_PROMPT}\n\n${FOOTNOTES_CLARIFICATION}`;

      case "translate":
        if (!command.payload) {
          const preamble =
            command.mode === "orthodox"
              ? ORTHODOX_TRANSLATION_PROMPT
              : STANDARD_TRANSLATION_PROMPT;
          return `${preamble}\n\n${TRANSLATION_CLARIFICATION}`;
        }
        return command.mode === "orthodox"
          ? this.orthodoxTranslationPrompt(command.payload, minScore)
          : this.standardTranslationPrompt(command.payload, message, minScore);
    }
  }

  private async orthodoxTranslationPrompt(
    payload: string,
    minScore: number,
  ): Promise<string> {
    const matches = this.dictionary.findMatches(payload, { minScore });
    const quotes = await this.bibleQuoteEntries(payload);
    const dictionaryPrompt = this.dictionary.buildPrompt([...matches, ...quotes]);

    return `${ORTHODOX_TRANSLATION_PROMPT}${dictionaryPrompt}\n\n${ORTHODOX_TRANSLATION_REQUEST}\n\n${payload}`;
  }

  private standardTranslationPrompt(
    payload: string,
    message: string,
    minScore: number,
  ): string {
    const matches = this.dictionary.findMatches(payload, { minScore });
    const dictionaryPrompt = this.dictionary.buildPrompt(matches);
    if (!dictionaryPrompt) {
      return message;
    }
    return `${STANDARD_TRANSLATION_PROMPT}${dictionaryPrompt}\n\n${payload}`;
  }

  /**
   * Source/target quote pairs for every citation that resolves in both
   * languages
   */
  private async bibleQuoteEntries(payload: string): Promise<TerminologyEntry[]> {
    const citations = distinctReferences(extractReferences(payload))
      .map((ref) => ref.reference)
      .filter((citation) => this.resolver.parse(citation) !== null);

    let pairs: Array<[ResolveResult, ResolveResult]>;
    try {
      pairs = await Promise.all(
        citations.map((citation) =>
          Promise.all([
            this.resolver.resolve(citation, this.config.passageSourceLang),
            this.resolver.resolve(citation, this.config.passageTargetLang),
          ]),
        ),
      );
    } catch (error) {
      this.logger.error("Bible quote lookup failed", toError(error), {
        citations: citations.length,
      });
      return [];
    }

    const entries: TerminologyEntry[] = [];
    for (const [source, target] of pairs) {
      if (source.success && target.success) {
        entries.push({
          term: truncateQuote(source.value.text),
          translations: [truncateQuote(target.value.text)],
        });
      }
    }

    if (citations.length > 0) {
      this.logger.debug("Resolved Bible quotes for translation", {
        citations: citations.length,
        resolved: entries.length,
      });
    }

    return entries;
  }

  private async footnotesPrompt(payload: string): Promise<string> {
    const result = await this.footnoteProcessor.process(payload);
    if (!result.success) {
      return footnotesErrorPrompt(result.error.message, payload);
    }

    const { annotatedText, footnotes } = result.value;
    if (footnotes.length === 0) {
      return `${FOOTNOTES_PROMPT}\n\n${annotatedText}\n\n${FOOTNOTES_NONE_RESOLVED}`;
    }
    return `${FOOTNOTES_PROMPT}\n\n${annotatedText}\n\nFootnotes:\n${formatFootnotes(footnotes)}`;
  }
}
