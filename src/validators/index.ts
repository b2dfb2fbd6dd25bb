import { ZodType, ZodTypeDef } from 'zod';
import { Result, fail, ok } from '../types';

export interface ValidationErrorBody {
  message: string;
  errors: Record<string, string[]>;
}

/**
 * Parses a request payload, collecting field-level messages on failure.
 * Issues that are not tied to a field (e.g. a non-object body) land under `body`.
 */
export function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown
): Result<T, ValidationErrorBody> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return ok(result.data);
  }

  const errors: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    (errors[field] ??= []).push(issue.message);
  }

  return fail({ message: 'Validation failed', errors });
}

export * from './auth.validators';
export * from './car.validators';
