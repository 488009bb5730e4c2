/**
 * Zod validation hook for OpenAPIHono routes.
 * Turns a failed body, query or path validation into a ValidationError
 * so it reaches the global error handler like any other error.
 */

import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { ValidationError } from '../utils/errors.js';

type ValidationResult = { target: string } & (
  | { success: true }
  | { success: false; error: ZodError }
);

export function formatIssues(error: ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Default hook for every router created with createRouter()
 *
 * @example
 * const router = new OpenAPIHono({ defaultHook: validationHook });
 */
export function validationHook(result: ValidationResult, _c: Context): void {
  if (!result.success) {
    throw new ValidationError('Request validation failed', {
      target: result.target,
      issues: formatIssues(result.error),
    });
  }
}
