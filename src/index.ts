import { serve } from '@hono/node-server';
import { sql } from 'drizzle-orm';
import { createApp } from './app.js';
import { env, resolveStorageDriver } from './config/env.js';
import { db, closeDatabase } from './config/database.js';
import { createRepositories } from './repositories/index.js';
import { createServices } from './services/index.js';

const port = env.PORT;
const version = '1.0.0';
const storage = resolveStorageDriver(env);
const database = db;

const app = createApp({
  services: createServices(createRepositories(storage, database)),
  health: {
    storage,
    ping: database
      ? async () => {
          await database.execute(sql`SELECT 1`);
        }
      : undefined,
  },
});

// Structured startup logging
console.log(
  JSON.stringify({
    timestamp: new Date().toISOString(),
    event: 'server_starting',
    version,
    environment: env.NODE_ENV,
    storage,
    port,
  })
);

const server = serve({ fetch: app.fetch, port }, (info) => {
  console.log(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      event: 'server_ready',
      version,
      environment: env.NODE_ENV,
      port: info.port,
      url: `http://localhost:${info.port}`,
    })
  );
});

function shutdown(signal: string) {
  console.log(JSON.stringify({ timestamp: new Date().toISOString(), event: 'server_stopping', signal }));

  server.close(() => {
    closeDatabase()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Failed to close database pool:', error);
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
