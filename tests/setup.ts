/**
 * Global test setup for all test suites.
 * Runs before each test file is imported, so the environment is in place
 * when src/config/env.ts parses it.
 */
process.env.NODE_ENV = 'test';
process.env.PORT = '3001';

// No database for tests: the app runs on the in-memory repositories
process.env.DATABASE_URL = '';
delete process.env.STORAGE_DRIVER;
delete process.env.LOG_SQL;
process.env.CORS_ORIGIN = '*';
