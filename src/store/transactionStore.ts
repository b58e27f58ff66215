/**
 * Durable storage contract for transactions.
 *
 * The reconciliation engine only reads through `get`/`list` and mutates
 * through `atomicUpdatePair`; `create` belongs to the ingestion gateway.
 */

import type { Decimal } from 'decimal.js';
import type { Provider, ReconciliationStatus, Transaction } from '../matching';

export interface TransactionFilter {
  status?: ReconciliationStatus;
  provider?: Provider;
}

export interface NewTransaction {
  provider: Provider;
  externalId: string;
  amount: Decimal;
  currency: string;
  transactionDate: string;
  description?: string | null;
  reference?: string | null;
}

export interface TransactionTransition {
  status: ReconciliationStatus;
  matchedTransactionId: string | null;
}

/**
 * One side of a conditional pair update: apply `next` only if the stored
 * status still equals `expectedStatus`.
 */
export interface PairUpdateSide {
  id: string;
  expectedStatus: ReconciliationStatus;
  next: TransactionTransition;
}

export interface PairUpdate {
  a: PairUpdateSide;
  b: PairUpdateSide;
}

export type PairUpdateResult = 'success' | 'conflict';

export interface TransactionStore {
  get(id: string): Promise<Transaction | null>;
  list(filter?: TransactionFilter): Promise<Transaction[]>;
  create(input: NewTransaction): Promise<Transaction>;
  /**
   * Applies both sides or neither. Returns `conflict` when either record's
   * status no longer matches its expectation.
   */
  atomicUpdatePair(update: PairUpdate): Promise<PairUpdateResult>;
}
