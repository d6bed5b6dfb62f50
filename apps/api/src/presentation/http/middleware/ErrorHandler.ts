import { Request, Response, NextFunction } from "express";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import {
  PassageLookupError,
  ReferenceParseError,
  ValidationError,
} from "../../../shared/errors/DomainError";
import { container } from "../../../di/Container";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Malformed JSON bodies surface from express.json() as a SyntaxError
 * carrying the raw body
 */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Centralized Error Handler Middleware
 *
 * Maps domain errors to HTTP errors and sends appropriate responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = container.resolve<ILogger>(TYPES.Logger);

  // Log error
  logger.error("Error handler caught error", err, {
    path: req.path,
    method: req.method,
  });

  // Handle known error types
  if (err instanceof HttpError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      error: "Request body is not valid JSON",
      code: "INVALID_JSON",
    });
    return;
  }

  // Map domain errors to HTTP errors
  if (err instanceof ValidationError) {
    res.status(400).json({
      error: err.message,
      code: err.code,
      field: err.field,
    });
    return;
  }

  if (err instanceof ReferenceParseError) {
    res.status(400).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  if (err instanceof PassageLookupError) {
    res.status(502).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  if (err instanceof AppError) {
    res.status(500).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Unknown error
  res.status(500).json({
    error:
      process.env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message,
    code: "INTERNAL_ERROR",
    ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
  });
}
