/**
 * Jest setup file
 * This file is executed before each test file
 */

// Set test environment variables BEFORE imports
process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.DATABASE_PATH = ':memory:';
process.env.RATE_LIMIT_MAX_REQUESTS = '10000';

// Global test timeout
jest.setTimeout(30000);

// better-sqlite3 registers its SqliteError class on the native addon once per process,
// but Jest gives every test file its own realm. Clear the flag so the next Database opened
// in this file registers this realm's SqliteError (otherwise errors fail `instanceof Error`).
import * as path from 'path';
import * as fs from 'fs';
const sqliteAddonPath = path.join(
  path.dirname(require.resolve('better-sqlite3/package.json')),
  'build',
  'Release',
  'better_sqlite3.node'
);
if (fs.existsSync(sqliteAddonPath)) {
  const sqliteAddon: { isInitialized?: boolean } = require(sqliteAddonPath);
  sqliteAddon.isInitialized = false;
}
