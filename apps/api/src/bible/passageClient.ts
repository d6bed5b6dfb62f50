/**
 * Passage Service Client
 *
 * Fetches verse text from the pericope service:
 *   POST { bookName, lang, whereExpr } -> [{ text, ... }, ...]
 *
 * Lookups never throw. Every failure is returned as a PassageFailure and
 * logged, so callers can drop the citation and carry on.
 */

import { request } from "undici";
import { z } from "zod";
import { ILogger } from "../infrastructure/logging/ILogger";
import { toError } from "../shared/errors/toError";
import { Result, fail, ok } from "../shared/result";
import { PassageQuery } from "./types";

export type PassageFailureReason =
  | "HTTP_ERROR"
  | "EMPTY_RESULT"
  | "INVALID_RESPONSE"
  | "TRANSPORT_ERROR";

export interface PassageFailure {
  reason: PassageFailureReason;
  message: string;
  statusCode?: number;
}

export type PassageResult = Result<string, PassageFailure>;

export interface IPassageClient {
  fetchPassage(query: PassageQuery): Promise<PassageResult>;
}

export interface HttpPassageClientOptions {
  endpoint: string;
  timeoutMs: number;
}

const verseListSchema = z.array(z.object({ text: z.string() }).passthrough());

/**
 * Join verse texts in response order
 */
export function joinVerses(verses: ReadonlyArray<{ text: string }>): string {
  return verses
    .map((verse) => `${verse.text} `)
    .join("")
    .trim();
}

export class HttpPassageClient implements IPassageClient {
  constructor(
    private readonly options: HttpPassageClientOptions,
    private readonly logger: ILogger,
  ) {}

  async fetchPassage(query: PassageQuery): Promise<PassageResult> {
    const exchange = await this.send(query).then(
      (response) => ok(response),
      (error: unknown) => fail(toError(error)),
    );
    if (!exchange.success) {
      return this.failure(query, {
        reason: "TRANSPORT_ERROR",
        message: `Passage service unreachable: ${exchange.error.message}`,
      });
    }

    const { statusCode, rawBody } = exchange.value;
    if (statusCode !== 200) {
      return this.failure(query, {
        reason: "HTTP_ERROR",
        message: `Passage service responded with status ${statusCode}`,
        statusCode,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      return this.failure(query, {
        reason: "INVALID_RESPONSE",
        message: "Passage service returned a body that is not JSON",
        statusCode,
      });
    }

    const parsed = verseListSchema.safeParse(payload);
    if (!parsed.success) {
      return this.failure(query, {
        reason: "INVALID_RESPONSE",
        message: "Passage service returned an unexpected payload",
        statusCode,
      });
    }

    if (parsed.data.length === 0) {
      return this.failure(query, {
        reason: "EMPTY_RESULT",
        message: "Passage service returned no verses",
        statusCode,
      });
    }

    this.logger.debug("Fetched passage", {
      ...query,
      verses: parsed.data.length,
    });
    return ok(joinVerses(parsed.data));
  }

  private async send(
    query: PassageQuery,
  ): Promise<{ statusCode: number; rawBody: string }> {
    const response = await request(this.options.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        accept: "application/json",
      },
      body: JSON.stringify(query),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
    });

    return {
      statusCode: response.statusCode,
      rawBody: await response.body.text(),
    };
  }

  private failure(query: PassageQuery, failure: PassageFailure): PassageResult {
    this.logger.warn("Passage lookup failed", { ...query, ...failure });
    return fail(failure);
  }
}
