import { Decimal } from 'decimal.js';
import type { Selectable } from 'kysely';
import { v4 as uuidv4 } from 'uuid';
import type { KyselyDB, TransactionsTable } from '../database/schema';
import { AMOUNT_DECIMAL_PLACES } from '../matching';
import type { Transaction } from '../matching';
import { AppError, ConstraintViolationError, StoreUnavailableError } from '../utils';
import logger from '../utils/logger';
import type {
  NewTransaction,
  PairUpdate,
  PairUpdateResult,
  TransactionFilter,
  TransactionStore,
} from './transactionStore';

/** SQLite result codes worth retrying */
const TRANSIENT_ERROR_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_CANTOPEN']);

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

export interface SqliteTransactionStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Raised inside the pair-update transaction to force a rollback
 */
class PairConflict extends Error {}

function sqliteErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toTransaction(row: Selectable<TransactionsTable>): Transaction {
  return {
    id: row.id,
    provider: row.provider,
    externalId: row.external_id,
    amount: new Decimal(row.amount),
    currency: row.currency,
    description: row.description,
    reference: row.reference,
    transactionDate: row.transaction_date,
    status: row.status,
    matchedTransactionId: row.matched_transaction_id,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Kysely/better-sqlite3 implementation of the transaction store.
 *
 * The SQLite dialect runs every query on one connection guarded by a mutex,
 * so a pair update's two conditional UPDATEs are never interleaved with
 * another caller's.
 */
export class SqliteTransactionStore implements TransactionStore {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly db: KyselyDB,
    options: SqliteTransactionStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
  }

  async get(id: string): Promise<Transaction | null> {
    try {
      const row = await this.db
        .selectFrom('transactions')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      return row ? toTransaction(row) : null;
    } catch (error) {
      throw this.translateError('get', error);
    }
  }

  async list(filter: TransactionFilter = {}): Promise<Transaction[]> {
    try {
      let query = this.db.selectFrom('transactions').selectAll();

      if (filter.status) {
        query = query.where('status', '=', filter.status);
      }
      if (filter.provider) {
        query = query.where('provider', '=', filter.provider);
      }

      const rows = await query
        .orderBy('transaction_date', 'desc')
        .orderBy('created_at', 'desc')
        .orderBy('id', 'desc')
        .execute();

      return rows.map(toTransaction);
    } catch (error) {
      throw this.translateError('list', error);
    }
  }

  async create(input: NewTransaction): Promise<Transaction> {
    const timestamp = this.now().toISOString();

    try {
      const row = await this.db
        .insertInto('transactions')
        .values({
          id: this.generateId(),
          provider: input.provider,
          external_id: input.externalId,
          amount: input.amount.toFixed(AMOUNT_DECIMAL_PLACES),
          currency: input.currency,
          description: input.description ?? null,
          reference: input.reference ?? null,
          transaction_date: input.transactionDate,
          status: 'pending',
          matched_transaction_id: null,
          created_at: timestamp,
          updated_at: timestamp,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toTransaction(row);
    } catch (error) {
      const code = sqliteErrorCode(error);
      if (code !== undefined && UNIQUE_VIOLATION_CODES.has(code)) {
        throw AppError.duplicate(
          `Transaction ${input.externalId} from ${input.provider} has already been ingested`
        );
      }
      throw this.translateError('create', error);
    }
  }

  async atomicUpdatePair(update: PairUpdate): Promise<PairUpdateResult> {
    if (update.a.id === update.b.id) {
      throw new ConstraintViolationError(`Cannot pair transaction ${update.a.id} with itself`, [
        update.a.id,
      ]);
    }

    const timestamp = this.now().toISOString();

    try {
      return await this.db.transaction().execute(async (trx) => {
        const current = await trx
          .selectFrom('transactions')
          .select(['id', 'status'])
          .where('id', 'in', [update.a.id, update.b.id])
          .execute();

        for (const side of [update.a, update.b]) {
          const row = current.find((candidate) => candidate.id === side.id);
          if (!row || row.status !== side.expectedStatus) {
            throw new PairConflict(side.id);
          }
        }

        for (const side of [update.a, update.b]) {
          const result = await trx
            .updateTable('transactions')
            .set({
              status: side.next.status,
              matched_transaction_id: side.next.matchedTransactionId,
              updated_at: timestamp,
            })
            .where('id', '=', side.id)
            .where('status', '=', side.expectedStatus)
            .executeTakeFirst();

          if (result.numUpdatedRows !== BigInt(1)) {
            throw new PairConflict(side.id);
          }
        }

        return 'success' as const;
      });
    } catch (error) {
      if (error instanceof PairConflict) {
        logger.debug(`Pair update ${update.a.id} ↔ ${update.b.id} rejected: ${error.message} changed`);
        return 'conflict';
      }

      // Both rows were pending yet the link is refused: stored matches are inconsistent
      const code = sqliteErrorCode(error);
      if (code !== undefined && code.startsWith('SQLITE_CONSTRAINT')) {
        throw new ConstraintViolationError(
          `Pairing ${update.a.id} with ${update.b.id} violates a storage constraint (${code})`,
          [update.a.id, update.b.id]
        );
      }
      throw this.translateError('atomicUpdatePair', error);
    }
  }

  private translateError(operation: string, error: unknown): unknown {
    const code = sqliteErrorCode(error);
    if (code !== undefined && [...TRANSIENT_ERROR_CODES].some((prefix) => code.startsWith(prefix))) {
      return new StoreUnavailableError(operation, error);
    }
    return error;
  }
}

export default SqliteTransactionStore;
