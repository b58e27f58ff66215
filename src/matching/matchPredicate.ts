/**
 * Matching predicate and candidate ranking.
 *
 * Pure, synchronous functions over loaded snapshots. Two transactions are
 * the two sides of the same intercompany transfer when:
 * 1. They are different records from different providers
 * 2. Their currencies are identical (exact string equality)
 * 3. Their amounts differ by at most AMOUNT_TOLERANCE (absolute)
 * 4. Their dates are at most DATE_WINDOW_DAYS apart (inclusive)
 * 5. Both are still pending
 */

import type { Decimal } from 'decimal.js';
import { AMOUNT_TOLERANCE } from './constants';
import { daysBetween, isWithinDateWindow } from './dateProximity';
import type { MatchableTransaction, MatchVerdict } from './types';

/**
 * Absolute amount difference between two transactions.
 */
export function amountDistance(a: Decimal, b: Decimal): Decimal {
  return a.minus(b).abs();
}

/**
 * True when two amounts agree within AMOUNT_TOLERANCE.
 */
export function isWithinAmountTolerance(a: Decimal, b: Decimal): boolean {
  return amountDistance(a, b).lte(AMOUNT_TOLERANCE);
}

/**
 * Evaluates the matching predicate, reporting the first failing rule.
 *
 * @example
 * evaluateMatch(xero100UsdJan1, quickbooks100_01UsdJan2) // { matches: true }
 * evaluateMatch(xero100Usd, quickbooks100Eur) // { matches: false, rejection: 'CURRENCY_MISMATCH' }
 */
export function evaluateMatch(
  transaction: MatchableTransaction,
  candidate: MatchableTransaction
): MatchVerdict {
  if (transaction.id === candidate.id) {
    return { matches: false, rejection: 'SAME_TRANSACTION' };
  }

  if (transaction.status !== 'pending' || candidate.status !== 'pending') {
    return { matches: false, rejection: 'NOT_PENDING' };
  }

  if (transaction.provider === candidate.provider) {
    return { matches: false, rejection: 'SAME_PROVIDER' };
  }

  if (transaction.currency !== candidate.currency) {
    return { matches: false, rejection: 'CURRENCY_MISMATCH' };
  }

  if (!isWithinAmountTolerance(transaction.amount, candidate.amount)) {
    return { matches: false, rejection: 'AMOUNT_OUT_OF_TOLERANCE' };
  }

  if (!isWithinDateWindow(transaction.transactionDate, candidate.transactionDate)) {
    return { matches: false, rejection: 'DATE_OUT_OF_WINDOW' };
  }

  return { matches: true };
}

/**
 * Orders two candidates for a given transaction: closest date first, then
 * closest amount, then earliest created. Id breaks exact ties so the order
 * is total.
 */
export function compareCandidates(
  transaction: Pick<MatchableTransaction, 'amount' | 'transactionDate'>,
  left: Pick<MatchableTransaction, 'id' | 'amount' | 'transactionDate' | 'createdAt'>,
  right: Pick<MatchableTransaction, 'id' | 'amount' | 'transactionDate' | 'createdAt'>
): number {
  const dateOrder =
    daysBetween(transaction.transactionDate, left.transactionDate) -
    daysBetween(transaction.transactionDate, right.transactionDate);
  if (dateOrder !== 0) {
    return dateOrder;
  }

  const amountOrder = amountDistance(transaction.amount, left.amount).comparedTo(
    amountDistance(transaction.amount, right.amount)
  );
  if (amountOrder !== 0) {
    return amountOrder;
  }

  const createdOrder = left.createdAt.getTime() - right.createdAt.getTime();
  if (createdOrder !== 0) {
    return createdOrder;
  }

  return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
}
