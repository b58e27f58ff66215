/**
 * Type Definitions for the Intercompany Reconciliation Matching Engine
 */

import type { Decimal } from 'decimal.js';
import type { PROVIDERS, RECONCILIATION_STATUSES } from './constants';

export type Provider = (typeof PROVIDERS)[number];

export type ReconciliationStatus = (typeof RECONCILIATION_STATUSES)[number];

/**
 * A transaction as recorded by one accounting provider.
 *
 * Everything except `status`, `matchedTransactionId` and `updatedAt` is
 * immutable after ingestion.
 */
export interface Transaction {
  id: string;
  provider: Provider;
  /** Identifier assigned by the provider (e.g. a bank transaction id) */
  externalId: string;
  /** Two-decimal fixed-point amount */
  amount: Decimal;
  /** ISO 4217 code, upper case */
  currency: string;
  description: string | null;
  reference: string | null;
  /** Calendar date, YYYY-MM-DD */
  transactionDate: string;
  status: ReconciliationStatus;
  /** Set if and only if status is `matched` */
  matchedTransactionId: string | null;
  /** Ingestion timestamp, used for deterministic tie-breaking */
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields the matching predicate and the index look at.
 */
export type MatchableTransaction = Pick<
  Transaction,
  'id' | 'provider' | 'amount' | 'currency' | 'transactionDate' | 'status' | 'createdAt'
>;

/**
 * Why a candidate failed the matching predicate.
 */
export type MatchRejection =
  | 'SAME_TRANSACTION'
  | 'SAME_PROVIDER'
  | 'CURRENCY_MISMATCH'
  | 'AMOUNT_OUT_OF_TOLERANCE'
  | 'DATE_OUT_OF_WINDOW'
  | 'NOT_PENDING';

export type MatchVerdict = { matches: true } | { matches: false; rejection: MatchRejection };

/**
 * Outcome of a reconciliation attempt as seen by callers.
 */
export interface ReconcileResult {
  status: ReconciliationStatus;
  matchedTransactionId?: string;
}
