import { OpenAPIHono, z } from '@hono/zod-openapi';
import type { AppEnv } from '../types/api.js';
import { validationHook } from '../middleware/validator.js';

/**
 * OpenAPI Configuration
 * Shared schemas and the router factory every route group is built with
 */

/**
 * Create an OpenAPI-enabled Hono instance whose request validation
 * failures surface as ValidationError.
 */
export function createRouter() {
  return new OpenAPIHono<AppEnv>({ defaultHook: validationHook });
}

export const ResponseMetaSchema = z.object({
  timestamp: z.string().openapi({ example: '2024-01-01T00:00:00.000Z' }),
  request_id: z.string().uuid(),
});

/**
 * Wrap a payload schema in the standard success envelope
 */
export function successSchema<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    success: z.literal(true),
    data,
    meta: ResponseMetaSchema,
  });
}

// Standard error response schema for OpenAPI documentation
export const ErrorResponseSchema = z
  .object({
    success: z.literal(false),
    error: z.object({
      code: z.string(),
      message: z.string(),
      details: z.record(z.unknown()).optional(),
    }),
    meta: ResponseMetaSchema,
  })
  .openapi('ErrorResponse');

export function errorResponse(description: string) {
  return {
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
    description,
  };
}

export const OPENAPI_INFO = {
  openapi: '3.0.0',
  info: {
    title: 'Nile Shop API',
    version: '1.0.0',
    description:
      'REST API for the Nile shop: item catalogue, customers and shopping carts.\n\n' +
      '## Error Response Format\n\n' +
      'All errors follow a standardized JSON format:\n' +
      '```json\n' +
      '{\n' +
      '  "success": false,\n' +
      '  "error": {\n' +
      '    "code": "ERROR_CODE",\n' +
      '    "message": "Human-readable error message",\n' +
      '    "details": {}\n' +
      '  },\n' +
      '  "meta": {\n' +
      '    "timestamp": "2024-01-01T00:00:00.000Z",\n' +
      '    "request_id": "uuid"\n' +
      '  }\n' +
      '}\n```\n\n' +
      '**Error Codes:**\n\n' +
      '- `BAD_REQUEST` (400): Request body is not valid JSON\n' +
      '- `NOT_FOUND` (404): Route does not exist\n' +
      '- `PAYLOAD_TOO_LARGE` (413): Request body exceeds 1MB\n' +
      '- `CONFLICT` (409): Duplicate item name or email, or the cart rules were broken\n' +
      '- `VALIDATION_ERROR` (422): Request validation failed, see `details` for field errors\n' +
      '- `INTERNAL_ERROR` (500): Unexpected server error',
  },
  tags: [
    { name: 'health', description: 'Health check endpoints' },
    { name: 'item', description: 'Item catalogue' },
    { name: 'user', description: 'Customers and their carts' },
  ],
};
