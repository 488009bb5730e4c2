/**
 * Global error handler middleware for Hono
 * Catches all errors and returns standardized error responses
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { AppEnv } from '../types/api.js';
import { AppError, type ErrorCode } from '../utils/errors.js';
import { error } from '../utils/response.js';
import { formatIssues } from './validator.js';
import { env } from '../config/env.js';

function codeForStatus(status: number): ErrorCode {
  switch (status) {
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 422:
      return 'VALIDATION_ERROR';
    default:
      return status >= 400 && status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
  }
}

/**
 * Global error handler middleware
 * Transforms all errors into standardized API error responses
 */
export async function errorHandler(err: Error, c: Context<AppEnv>) {
  const requestId = c.get('requestId');

  const logEntry = {
    timestamp: new Date().toISOString(),
    request_id: requestId,
    name: err.name,
    message: err.message,
  };

  // Handle custom AppError instances
  if (err instanceof AppError) {
    if (err.isOperational) {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.error(JSON.stringify({ ...logEntry, stack: err.stack }));
    }

    return c.json(error(err.code, err.message, err.details, requestId), err.statusCode);
  }

  // Handle Zod validation errors (if thrown directly)
  if (err instanceof ZodError) {
    console.warn(JSON.stringify(logEntry));
    return c.json(
      error('VALIDATION_ERROR', 'Request validation failed', { issues: formatIssues(err) }, requestId),
      422
    );
  }

  // Errors raised by Hono itself (e.g. malformed JSON body)
  if (err instanceof HTTPException) {
    console.warn(JSON.stringify(logEntry));
    return c.json(error(codeForStatus(err.status), err.message, undefined, requestId), err.status);
  }

  console.error('❌ Error caught by error handler:', { ...logEntry, stack: err.stack });

  // Don't leak error details outside development
  const errorDetails =
    env.NODE_ENV === 'development'
      ? {
          name: err.name,
          message: err.message,
          stack: err.stack,
        }
      : undefined;

  return c.json(
    error('INTERNAL_ERROR', 'An unexpected error occurred', errorDetails, requestId),
    500
  );
}

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(c: Context<AppEnv>) {
  return c.json(
    error('NOT_FOUND', `Route ${c.req.method} ${new URL(c.req.url).pathname} not found`, undefined, c.get('requestId')),
    404
  );
}
