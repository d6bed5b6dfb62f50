import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { AddFootnotesDto, FootnotedTextDto } from "../dto/ScriptureDtos";
import { FootnoteProcessor } from "../../../bible/footnoteProcessor";
import { PassageLookupError } from "../../../shared/errors/DomainError";
import { TYPES } from "../../../di/types";

@injectable()
export class AddFootnotesUseCase
  implements IUseCase<AddFootnotesDto, FootnotedTextDto>
{
  constructor(
    @inject(TYPES.FootnoteProcessor)
    private footnoteProcessor: FootnoteProcessor,
  ) {}

  async execute(dto: AddFootnotesDto): Promise<FootnotedTextDto> {
    const result = await this.footnoteProcessor.process(dto.text);
    if (!result.success) {
      throw new PassageLookupError(result.error.message, result.error.reason);
    }
    return result.value;
  }
}
