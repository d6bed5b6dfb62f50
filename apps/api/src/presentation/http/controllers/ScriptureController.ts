import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { ResolvePassageUseCase } from "../../../application/scripture/use-cases/ResolvePassageUseCase";
import { AddFootnotesUseCase } from "../../../application/scripture/use-cases/AddFootnotesUseCase";
import {
  AddFootnotesDto,
  ResolvePassageDto,
} from "../../../application/scripture/dto/ScriptureDtos";
import { TYPES } from "../../../di/types";
import {
  PassageLookupError,
  ReferenceParseError,
  ValidationError,
} from "../../../shared/errors/DomainError";
import { BadGatewayError, BadRequestError } from "../../../shared/errors/HttpError";

/**
 * Scripture HTTP Controller
 *
 * Passage lookup and footnoting of annotated text
 */
@injectable()
export class ScriptureController {
  constructor(
    @inject(TYPES.ResolvePassageUseCase)
    private resolvePassageUseCase: ResolvePassageUseCase,
    @inject(TYPES.AddFootnotesUseCase)
    private addFootnotesUseCase: AddFootnotesUseCase,
  ) {}

  /**
   * POST /api/v1/scripture/resolve - Look up the text of one citation
   */
  async resolve(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto = ResolvePassageDto.fromRequest(req.body);

      const passage = await this.resolvePassageUseCase.execute(dto);

      res.status(200).json({
        ok: true,
        ...passage,
      });
    } catch (error) {
      next(this.toHttpError(error));
    }
  }

  /**
   * POST /api/v1/scripture/footnotes - Add footnotes for the citations in text
   */
  async footnotes(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto = AddFootnotesDto.fromRequest(req.body);

      const result = await this.addFootnotesUseCase.execute(dto);

      res.status(200).json({
        ok: true,
        ...result,
      });
    } catch (error) {
      next(this.toHttpError(error));
    }
  }

  private toHttpError(error: unknown): unknown {
    if (error instanceof ValidationError || error instanceof ReferenceParseError) {
      return new BadRequestError(error.message, error.code);
    }
    if (error instanceof PassageLookupError) {
      return new BadGatewayError(error.message, error.code);
    }
    return error;
  }
}
