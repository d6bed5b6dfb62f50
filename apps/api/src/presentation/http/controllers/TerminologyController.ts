import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { FindTermMatchesUseCase } from "../../../application/terminology/use-cases/FindTermMatchesUseCase";
import { FindTermMatchesDto } from "../../../application/terminology/dto/FindTermMatchesDto";
import { TYPES } from "../../../di/types";
import { ValidationError } from "../../../shared/errors/DomainError";
import { BadRequestError } from "../../../shared/errors/HttpError";

@injectable()
export class TerminologyController {
  constructor(
    @inject(TYPES.FindTermMatchesUseCase)
    private findTermMatchesUseCase: FindTermMatchesUseCase,
  ) {}

  /**
   * POST /api/v1/terminology/matches - Find dictionary terms in text
   */
  async matches(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto = FindTermMatchesDto.fromRequest(req.body);

      const result = await this.findTermMatchesUseCase.execute(dto);

      res.status(200).json({
        ok: true,
        ...result,
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
