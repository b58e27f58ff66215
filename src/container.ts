/**
 * Wires the reconciliation components together.
 *
 * One container per process (or per test): a database, the store over it,
 * the in-memory index hydrated from every pending transaction, and the
 * services built on top.
 */

import { env } from './config';
import { checkDatabaseHealth, closeDatabase, createDatabase, migrateToLatest } from './database';
import type { KyselyDB } from './database';
import { MatchIndex } from './matching';
import { HealthService, IngestionGateway, ReconciliationEngine, TransactionService } from './services';
import type { ReadinessChecks } from './services';
import { SqliteTransactionStore } from './store';
import type { TransactionStore } from './store';
import { logger } from './utils';
import type { SweepScheduler } from './workers/reconciliation.queue';

export interface AppContainer {
  db: KyselyDB;
  store: TransactionStore;
  index: MatchIndex;
  engine: ReconciliationEngine;
  gateway: IngestionGateway;
  transactions: TransactionService;
  health: HealthService;
  sweepScheduler: SweepScheduler | null;
  uploadsDir?: string;
  close(): Promise<void>;
}

export interface ContainerOptions {
  databasePath?: string;
  sweepScheduler?: SweepScheduler | null;
  readinessChecks?: ReadinessChecks;
  uploadsDir?: string;
}

export async function createContainer(options: ContainerOptions = {}): Promise<AppContainer> {
  const db = createDatabase(options.databasePath ?? env.DATABASE_PATH);
  await migrateToLatest(db);

  const store = new SqliteTransactionStore(db);
  const index = new MatchIndex();

  const indexed = index.hydrate(await store.list({ status: 'pending' }));
  logger.info(`🗂️  Match index hydrated with ${indexed} pending transactions`);

  const engine = new ReconciliationEngine(store, index);
  const gateway = new IngestionGateway(store, index, engine);
  const transactions = new TransactionService(store);
  const health = new HealthService({
    database: () => checkDatabaseHealth(db),
    ...options.readinessChecks,
  });

  return {
    db,
    store,
    index,
    engine,
    gateway,
    transactions,
    health,
    sweepScheduler: options.sweepScheduler ?? null,
    uploadsDir: options.uploadsDir,
    close: () => closeDatabase(db),
  };
}

export default createContainer;
