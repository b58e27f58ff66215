import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { Kysely, Migrator, SqliteDialect, sql, type Migration, type MigrationProvider } from 'kysely';
import { env } from '../config';
import logger from '../utils/logger';
import * as createTransactions from './migrations/001_create_transactions';
import type { DatabaseSchema, KyselyDB } from './schema';

const IN_MEMORY = ':memory:';

/**
 * Migrations are bundled with the code rather than discovered on disk,
 * so the same list runs from sources under ts-jest and from dist/.
 */
const migrations: Record<string, Migration> = {
  '001_create_transactions': createTransactions,
};

class BundledMigrationProvider implements MigrationProvider {
  async getMigrations(): Promise<Record<string, Migration>> {
    return migrations;
  }
}

/**
 * Opens the SQLite database and wraps it in a Kysely instance.
 * Pass ':memory:' for a throwaway in-process database.
 */
export function createDatabase(databasePath: string = env.DATABASE_PATH): KyselyDB {
  if (databasePath !== IN_MEMORY) {
    const dataDir = path.dirname(databasePath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqliteDb = new Database(databasePath);

  sqliteDb.pragma('foreign_keys = ON');
  if (databasePath !== IN_MEMORY) {
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
  }
  sqliteDb.pragma('busy_timeout = 5000');

  logger.info(`📦 Database opened: ${databasePath}`);

  return new Kysely<DatabaseSchema>({
    dialect: new SqliteDialect({ database: sqliteDb }),
  });
}

/**
 * Brings the schema up to date, throwing if any migration fails
 */
export async function migrateToLatest(db: KyselyDB): Promise<void> {
  const migrator = new Migrator({ db, provider: new BundledMigrationProvider() });

  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.info(`Migration "${result.migrationName}" executed successfully`);
    } else if (result.status === 'Error') {
      logger.error(`Migration "${result.migrationName}" failed`);
    }
  }

  if (error) {
    logger.error('❌ Database migration failed:', error);
    throw error instanceof Error ? error : new Error(String(error));
  }
}

export async function closeDatabase(db: KyselyDB): Promise<void> {
  try {
    await db.destroy();
    logger.info('📦 Database disconnected');
  } catch (error) {
    logger.error('❌ Database disconnect failed:', error);
    throw error;
  }
}

export async function checkDatabaseHealth(db: KyselyDB): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    logger.warn(
      `Database health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return false;
  }
}
