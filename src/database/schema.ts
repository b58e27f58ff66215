import type { Kysely } from 'kysely';
import type { Provider, ReconciliationStatus } from '../matching';

/**
 * Database schema definitions.
 * Amounts are stored as two-decimal TEXT so no precision is lost in SQLite;
 * dates and timestamps are ISO strings.
 */

export interface TransactionsTable {
  id: string;
  provider: Provider;
  external_id: string;
  amount: string;
  currency: string;
  description: string | null;
  reference: string | null;
  /** YYYY-MM-DD */
  transaction_date: string;
  status: ReconciliationStatus;
  matched_transaction_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface DatabaseSchema {
  transactions: TransactionsTable;
}

export type KyselyDB = Kysely<DatabaseSchema>;
