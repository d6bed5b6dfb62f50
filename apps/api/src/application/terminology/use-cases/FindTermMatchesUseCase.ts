import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { FindTermMatchesDto, TermMatchesDto } from "../dto/FindTermMatchesDto";
import { TerminologyDictionary } from "../../../terminology/dictionary";
import { IConfig } from "../../../shared/config/IConfig";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Find Term Matches Use Case
 *
 * Scans text for dictionary terms and returns the matches together with
 * the dictionary block a translation prompt would carry
 */
@injectable()
export class FindTermMatchesUseCase
  implements IUseCase<FindTermMatchesDto, TermMatchesDto>
{
  constructor(
    @inject(TYPES.TerminologyDictionary)
    private dictionary: TerminologyDictionary,

    @inject(TYPES.Config)
    private config: IConfig,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(dto: FindTermMatchesDto): Promise<TermMatchesDto> {
    const minScore = dto.minScore ?? this.config.minMatchScore;
    const matches = this.dictionary.findMatches(dto.text, { minScore });

    this.logger.debug("Terminology scan", {
      minScore,
      matches: matches.length,
    });

    return {
      matches,
      prompt: this.dictionary.buildPrompt(matches),
    };
  }
}
