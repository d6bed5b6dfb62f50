import { z } from "zod";
import { ValidationError } from "../../shared/errors/DomainError";

/**
 * Parse a request body against a zod schema, raising ValidationError
 * with the first issue on failure
 */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(
      field ? `${field}: ${issue.message}` : issue.message,
      field || undefined,
    );
  }
  return result.data;
}
