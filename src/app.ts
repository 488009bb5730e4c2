import { OpenAPIHono } from '@hono/zod-openapi';
import { swaggerUI } from '@hono/swagger-ui';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import { bodyLimit } from 'hono/body-limit';
import { HTTPException } from 'hono/http-exception';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestId, requestLogger } from './middleware/request-logger.js';
import { validationHook } from './middleware/validator.js';
import { OPENAPI_INFO } from './config/openapi.js';
import { env } from './config/env.js';
import type { Services } from './services/index.js';
import {
  createHealthRoutes,
  createItemRoutes,
  createUserRoutes,
  type HealthProbe,
} from './routes/index.js';
import type { AppEnv } from './types/api.js';
import { success } from './utils/response.js';

export interface AppOptions {
  services: Services;
  health: HealthProbe;
  /** Comma-separated origins or '*'. Defaults to CORS_ORIGIN. */
  corsOrigin?: string;
}

function resolveCorsOrigin(corsOrigin: string) {
  if (corsOrigin === '*') {
    return '*';
  }

  const allowedOrigins = corsOrigin.split(',').map((origin) => origin.trim());

  return (origin: string) => (allowedOrigins.includes(origin) ? origin : allowedOrigins[0]);
}

/**
 * Build the HTTP application over a set of services.
 * Trailing slashes are ignored, so `/items/` and `/items` are the same route.
 */
export function createApp({ services, health, corsOrigin = env.CORS_ORIGIN }: AppOptions) {
  const app = new OpenAPIHono<AppEnv>({ strict: false, defaultHook: validationHook });

  app.use('*', requestId);

  // Structured request timing logger
  app.use('*', requestLogger);

  app.use('*', secureHeaders());

  // Request body size limit (1MB)
  app.use(
    '*',
    bodyLimit({
      maxSize: 1024 * 1024,
      onError: () => {
        throw new HTTPException(413, { message: 'Request body exceeds 1MB' });
      },
    })
  );

  app.use(
    '*',
    cors({
      origin: resolveCorsOrigin(corsOrigin),
      credentials: true,
    })
  );

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  app.get('/', (c) =>
    c.json(success({ message: 'Thanks for shopping at Nile!' }, c.get('requestId')), 200)
  );

  app.route('/health', createHealthRoutes(health));
  app.route('/items', createItemRoutes(services.items));
  app.route('/users', createUserRoutes(services.users, services.cart));

  app.doc('/openapi.json', OPENAPI_INFO);
  app.get('/docs', swaggerUI({ url: '/openapi.json' }));

  return app;
}

export type App = ReturnType<typeof createApp>;
