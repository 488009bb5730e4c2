import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { env } from './env.js';
import * as schema from '../db/schema/index.js';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

/**
 * Drizzle database instance for PostgreSQL over the standard `pg` TCP driver.
 *
 * `null` when DATABASE_URL is not configured; the API then runs on the
 * in-memory repositories. Set LOG_SQL=true to echo every statement.
 */
let db: Database | null = null;
let pool: pg.Pool | null = null;

try {
  if (env.DATABASE_URL) {
    pool = new Pool({
      connectionString: env.DATABASE_URL,
    });
    db = drizzle(pool, { schema, logger: env.LOG_SQL });
    console.log('✅ Database connection established (PostgreSQL TCP)');
  } else {
    console.warn('⚠️  DATABASE_URL not configured - database features disabled');
  }
} catch (error) {
  console.error('❌ Failed to initialize database connection:', error);

  if (env.NODE_ENV === 'production') {
    console.error('💥 Cannot start application without database in production mode');
    process.exit(1);
  } else {
    console.warn('⚠️  Continuing in development mode without database');
  }
}

/**
 * Close the connection pool. Safe to call when no database is configured.
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}

export { db };
