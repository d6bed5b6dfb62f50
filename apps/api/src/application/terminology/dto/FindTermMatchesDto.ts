import { z } from "zod";
import { MatchResult } from "../../../terminology/types";
import { parseRequest } from "../../shared/validation";

const findTermMatchesSchema = z.object({
  text: z.string().min(1).max(20000),
  minScore: z.number().min(0).max(100).optional(),
});

export class FindTermMatchesDto {
  constructor(
    public readonly text: string,
    public readonly minScore?: number,
  ) {}

  static fromRequest(body: unknown): FindTermMatchesDto {
    const parsed = parseRequest(findTermMatchesSchema, body);
    return new FindTermMatchesDto(parsed.text, parsed.minScore);
  }
}

export interface TermMatchesDto {
  readonly matches: readonly MatchResult[];
  readonly prompt: string;
}
