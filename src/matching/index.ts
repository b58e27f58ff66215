/**
 * Intercompany Reconciliation Matching Engine
 *
 * Pure matching rules plus the in-memory index of pending transactions.
 * Persistence and the atomic state transition live in the services layer.
 *
 * Usage:
 * ```typescript
 * import { MatchIndex, evaluateMatch } from '../matching';
 *
 * const index = new MatchIndex();
 * index.insert(transaction);
 * for (const candidateId of index.query(transaction)) { ... }
 * ```
 */

export { MatchIndex } from './matchIndex';

export {
  evaluateMatch,
  compareCandidates,
  amountDistance,
  isWithinAmountTolerance,
} from './matchPredicate';
export {
  daysBetween,
  toDayNumber,
  isCalendarDate,
  isWithinDateWindow,
} from './dateProximity';

// Constants
export {
  PROVIDERS,
  RECONCILIATION_STATUSES,
  AMOUNT_TOLERANCE,
  DATE_WINDOW_DAYS,
  AMOUNT_DECIMAL_PLACES,
} from './constants';

// Types
export type {
  Provider,
  ReconciliationStatus,
  Transaction,
  MatchableTransaction,
  MatchRejection,
  MatchVerdict,
  ReconcileResult,
} from './types';
