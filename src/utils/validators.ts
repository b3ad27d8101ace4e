import { z } from 'zod';
import { ValidationError } from '../models/errors';

/**
 * Parse request input against a zod schema. Throws ValidationError listing
 * each failing field, which the error handler answers with 422.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
      code: e.code
    }));
    throw new ValidationError('Request validation failed', details);
  }
  return result.data;
}
