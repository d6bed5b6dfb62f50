import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { PassageDto, ResolvePassageDto } from "../dto/ScriptureDtos";
import { ScriptureResolver } from "../../../bible/scriptureResolver";
import { IConfig } from "../../../shared/config/IConfig";
import { PassageLookupError, ReferenceParseError } from "../../../shared/errors/DomainError";
import { TYPES } from "../../../di/types";

/**
 * Resolve Passage Use Case
 *
 * Looks up the text of a single citation. Unlike the prompt pipeline,
 * a failed lookup is an error for the caller.
 */
@injectable()
export class ResolvePassageUseCase
  implements IUseCase<ResolvePassageDto, PassageDto>
{
  constructor(
    @inject(TYPES.ScriptureResolver)
    private resolver: ScriptureResolver,

    @inject(TYPES.Config)
    private config: IConfig,
  ) {}

  async execute(dto: ResolvePassageDto): Promise<PassageDto> {
    const result = await this.resolver.resolve(
      dto.reference,
      dto.lang ?? this.config.passageSourceLang,
    );

    if (!result.success) {
      if (result.error.reason === "UNPARSEABLE_REFERENCE") {
        throw new ReferenceParseError(dto.reference);
      }
      throw new PassageLookupError(result.error.message, result.error.reason);
    }

    return result.value;
  }
}
