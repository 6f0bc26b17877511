import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Render zod issues as `path: message` pairs joined with `; `.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 */
export function fromZod<TOutput, TInput = TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  input: unknown
): Result<TOutput, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}
