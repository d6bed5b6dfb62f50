import { z } from "zod";
import { parseRequest } from "../../shared/validation";
import { CommandType } from "../commands";

export const chatMessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;

const processMessageSchema = z.object({
  message: z.string().min(1).max(20000),
  orthodoxMode: z.boolean().optional(),
  minScore: z.number().min(0).max(100).optional(),
  history: z.array(chatMessageSchema).max(100).optional().default([]),
});

/**
 * Process Message DTO
 *
 * One user turn plus the conversation so far. Omitted settings fall back
 * to the configured defaults.
 */
export class ProcessMessageDto {
  constructor(
    public readonly message: string,
    public readonly history: readonly ChatMessage[] = [],
    public readonly orthodoxMode?: boolean,
    public readonly minScore?: number,
  ) {}

  static fromRequest(body: unknown): ProcessMessageDto {
    const parsed = parseRequest(processMessageSchema, body);
    return new ProcessMessageDto(
      parsed.message,
      parsed.history,
      parsed.orthodoxMode,
      parsed.minScore,
    );
  }
}

/**
 * Processed Query (Response)
 */
export interface ProcessedQueryDto {
  readonly command: CommandType;
  readonly prompt: string;
  readonly messages: readonly Readonly<ChatMessage>[];
}
