import { AppError } from "./AppError";

/**
 * HTTP-level errors
 *
 * These map to HTTP status codes
 */

export class HttpError extends AppError {
  constructor(
    message: string,
    public readonly statusCode: number,
    code: string,
  ) {
    super(message, code);
    this.name = "HttpError";
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, code = "BAD_REQUEST") {
    super(message, 400, code);
    this.name = "BadRequestError";
  }
}

export class BadGatewayError extends HttpError {
  constructor(message = "Upstream service failed", code = "BAD_GATEWAY") {
    super(message, 502, code);
    this.name = "BadGatewayError";
  }
}
