import type { ZodSchema } from 'zod';
import { ValidationError } from '../errors/index.js';

/**
 * Validate data against a Zod schema
 * @throws {ValidationError} if validation fails
 */
export function validate<T>(
  data: unknown,
  schema: ZodSchema<T>,
  message = 'API response validation failed',
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new ValidationError(message, result.error);
  }

  return result.data;
}
