/**
 * Validation helpers shared by the schemas.
 */

import type { ZodError } from 'zod';

export interface ValidationError {
  path: string;
  message: string;
  expected?: string;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; errors: ValidationError[] };

/**
 * Formats Zod validation errors into user-friendly format
 */
export function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(issue => ({
    path: issue.path.join('.') || 'root',
    message: issue.message,
    expected:
      issue.code === 'invalid_type' ? `expected ${issue.expected}, got ${issue.received}` : undefined,
  }));
}

/**
 * One line per error, e.g. "timeout: Expected number, received string".
 */
export function describeValidationErrors(errors: ValidationError[]): string {
  return errors.map(error => `${error.path}: ${error.message}`).join('; ');
}
