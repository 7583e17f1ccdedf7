/**
 * Tool argument validation
 * Validates tool arguments using Zod schemas
 */

import type { z, ZodTypeAny } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldError[] };

export interface FieldError {
  path: string;
  message: string;
}

/**
 * Validate tool arguments against schema
 */
export function validateToolArgs<S extends ZodTypeAny>(schema: S, args: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(args);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Format validation errors for the caller
 */
export function formatValidationErrors(errors: FieldError[]): string {
  if (errors.length === 0) {
    return 'No validation errors';
  }

  const formatted = errors.map((err) => (err.path ? `${err.path}: ${err.message}` : err.message));

  return `Validation errors:\n${formatted.join('\n')}`;
}
