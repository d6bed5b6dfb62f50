import { z } from "zod";
import { Footnote, ScriptureReference } from "../../../bible/types";
import { parseRequest } from "../../shared/validation";

const resolvePassageSchema = z.object({
  reference: z.string().min(1).max(200),
  lang: z
    .string()
    .regex(/^[a-z]{2,3}$/, "lang must be a 2-3 letter language code")
    .optional(),
});

const addFootnotesSchema = z.object({
  text: z.string().min(1).max(50000),
});

export class ResolvePassageDto {
  constructor(
    public readonly reference: string,
    public readonly lang?: string,
  ) {}

  static fromRequest(body: unknown): ResolvePassageDto {
    const parsed = parseRequest(resolvePassageSchema, body);
    return new ResolvePassageDto(parsed.reference, parsed.lang);
  }
}

export interface PassageDto {
  readonly reference: ScriptureReference;
  readonly lang: string;
  readonly text: string;
}

export class AddFootnotesDto {
  constructor(public readonly text: string) {}

  static fromRequest(body: unknown): AddFootnotesDto {
    const parsed = parseRequest(addFootnotesSchema, body);
    return new AddFootnotesDto(parsed.text);
  }
}

export interface FootnotedTextDto {
  readonly annotatedText: string;
  readonly footnotes: readonly Footnote[];
}
