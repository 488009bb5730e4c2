/**
 * Standardized API response types
 * All API responses follow this format for consistency
 */

export interface ResponseMeta {
  timestamp: string;
  request_id: string;
}

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  meta: ResponseMeta;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  meta: ResponseMeta;
}

/**
 * Hono environment shared by the app and every route group
 */
export type AppEnv = {
  Variables: {
    requestId: string;
  };
};
