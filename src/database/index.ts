export { createDatabase, migrateToLatest, closeDatabase, checkDatabaseHealth } from './client';
export type { DatabaseSchema, KyselyDB, TransactionsTable } from './schema';
