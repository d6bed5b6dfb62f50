import { AppError } from "./AppError";

/**
 * Domain-level errors
 *
 * These represent invalid input or configuration for the prompt pipeline
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

export class ReferenceParseError extends AppError {
  constructor(public readonly reference: string) {
    super(`Could not parse Bible reference "${reference}"`, "UNPARSEABLE_REFERENCE");
    this.name = "ReferenceParseError";
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reference: this.reference,
    };
  }
}

export class PassageLookupError extends AppError {
  constructor(
    message: string,
    public readonly reason: string,
  ) {
    super(message, "PASSAGE_LOOKUP_FAILED");
    this.name = "PassageLookupError";
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
    };
  }
}
