import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Error classes shared by the services and the HTTP layer.
 * Services throw these; the global error handler turns them into responses.
 */

export type ErrorCode =
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'INTERNAL_ERROR';

/**
 * Base application error class
 * All custom errors should extend this class
 */
export class AppError extends Error {
  public readonly statusCode: ContentfulStatusCode;
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: ContentfulStatusCode,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 422 Unprocessable Entity - Validation failed
 */
export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super(message, 422, 'VALIDATION_ERROR', details);
  }
}

/**
 * 409 Conflict - Resource conflict (duplicate name/email, cart rule broken)
 */
export class ConflictError extends AppError {
  constructor(message = 'Resource conflict', details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details, false);
  }
}

/**
 * PostgreSQL unique_violation, as surfaced by the `pg` driver.
 */
export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === '23505'
  );
}

/**
 * Name of the constraint a PostgreSQL error reports, if any.
 */
export function violatedConstraint(err: unknown): string | undefined {
  if (
    typeof err === 'object' &&
    err !== null &&
    'constraint' in err &&
    typeof err.constraint === 'string'
  ) {
    return err.constraint;
  }
  return undefined;
}
