/**
 * Standardized API response builders
 * All API responses should use these helpers for consistency
 */

import type {
  ApiSuccessResponse,
  ApiErrorResponse,
  ResponseMeta,
} from '../types/api.js';

/**
 * Generate response metadata with timestamp and request ID.
 * A fresh ID is minted when the caller has none.
 */
function generateMeta(requestId?: string): ResponseMeta {
  return {
    timestamp: new Date().toISOString(),
    request_id: requestId ?? crypto.randomUUID(),
  };
}

/**
 * Build a successful API response
 */
export function success<T>(data: T, requestId?: string): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    meta: generateMeta(requestId),
  };
}

/**
 * Build an error API response
 * @param code - Error code (e.g., "CONFLICT", "NOT_FOUND")
 * @param message - Human-readable error message
 * @param details - Optional additional error details
 */
export function error(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      details,
    },
    meta: generateMeta(requestId),
  };
}
