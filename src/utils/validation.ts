import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Parse input against a zod schema, surfacing the first issue as a ValidationError
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (!issue) {
    throw new ValidationError('Invalid input');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
  throw new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field);
}
