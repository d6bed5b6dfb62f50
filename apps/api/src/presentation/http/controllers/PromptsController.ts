import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { ProcessUserMessageUseCase } from "../../../application/prompts/use-cases/ProcessUserMessageUseCase";
import { ProcessMessageDto } from "../../../application/prompts/dto/ProcessMessageDto";
import { TYPES } from "../../../di/types";
import { ValidationError } from "../../../shared/errors/DomainError";
import { BadRequestError } from "../../../shared/errors/HttpError";

/**
 * Prompts HTTP Controller
 *
 * Turns a chat message into the prompt sent to the model
 */
@injectable()
export class PromptsController {
  constructor(
    @inject(TYPES.ProcessUserMessageUseCase)
    private processUserMessageUseCase: ProcessUserMessageUseCase,
  ) {}

  /**
   * POST /api/v1/prompts - Classify a message and build its prompt
   */
  async process(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto = ProcessMessageDto.fromRequest(req.body);

      const query = await this.processUserMessageUseCase.execute(dto);

      res.status(200).json({
        ok: true,
        ...query,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        next(new BadRequestError(error.message, error.code));
      } else {
        next(error);
      }
    }
  }
}
