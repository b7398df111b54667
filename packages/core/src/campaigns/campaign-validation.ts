import type { ZodType } from 'zod';
import { ValidationError } from './campaign-errors.js';

/**
 * Parse `input` with a zod schema, mapping the first issue to a ValidationError
 */
export function parseOrThrow<T>(schema: ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  throw new ValidationError(`Invalid ${field}: ${issue?.message ?? 'validation failed'}`);
}
