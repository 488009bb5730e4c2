import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/api.js';

/**
 * Request timing and structured JSON logging middleware
 * Logs every request with timing information in JSON format
 * Warns on slow requests (>500ms)
 */
export const requestLogger: MiddlewareHandler<AppEnv> = async (c, next) => {
  const start = Date.now();

  await next();

  const duration = Date.now() - start;
  const { method, url } = c.req;
  const status = c.res.status;

  const logEntry = {
    timestamp: new Date().toISOString(),
    request_id: c.get('requestId'),
    method,
    path: new URL(url).pathname,
    status,
    duration_ms: duration,
  };

  if (status >= 500) {
    console.error(JSON.stringify(logEntry));
  } else if (status >= 400) {
    console.warn(JSON.stringify(logEntry));
  } else if (duration > 500) {
    console.warn(JSON.stringify({ ...logEntry, warning: 'slow_request' }));
  } else {
    console.log(JSON.stringify(logEntry));
  }
};

/**
 * Assign every request an ID, reusing an incoming X-Request-Id
 */
export const requestId: MiddlewareHandler<AppEnv> = async (c, next) => {
  const id = c.req.header('X-Request-Id') || crypto.randomUUID();
  c.set('requestId', id);
  c.header('X-Request-Id', id);
  await next();
};
