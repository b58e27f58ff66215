/**
 * Reconciliation error taxonomy.
 *
 * - TransactionNotFoundError: referenced id does not exist (surfaced, 404)
 * - ConstraintViolationError: stored pair breaks symmetry or one-match-per-transaction (fatal, 500)
 * - ConcurrentMatchLostError: a candidate was claimed between query and transition (never surfaced)
 * - StoreUnavailableError: transient storage failure, safe to retry (503)
 *
 * A reconciliation that finds no counterpart is not an error: the transaction stays pending.
 */

import { AppError } from './AppError';

export class TransactionNotFoundError extends AppError {
  public readonly transactionId: string;

  constructor(transactionId: string) {
    super(`Transaction ${transactionId} not found`, 404, true, 'TRANSACTION_NOT_FOUND');
    this.transactionId = transactionId;
    Object.setPrototypeOf(this, TransactionNotFoundError.prototype);
  }
}

export class ConstraintViolationError extends AppError {
  public readonly transactionIds: readonly string[];

  constructor(message: string, transactionIds: readonly string[]) {
    super(message, 500, false, 'CONSTRAINT_VIOLATION');
    this.transactionIds = transactionIds;
    Object.setPrototypeOf(this, ConstraintViolationError.prototype);
  }
}

export class ConcurrentMatchLostError extends AppError {
  public readonly transactionId: string;
  public readonly candidateId: string;

  constructor(transactionId: string, candidateId: string) {
    super(
      `Candidate ${candidateId} was claimed before ${transactionId} could match it`,
      409,
      true,
      'CONCURRENT_MATCH_LOST'
    );
    this.transactionId = transactionId;
    this.candidateId = candidateId;
    Object.setPrototypeOf(this, ConcurrentMatchLostError.prototype);
  }
}

export class StoreUnavailableError extends AppError {
  public readonly operation: string;
  public readonly originalError: unknown;

  constructor(operation: string, originalError: unknown) {
    const reason = originalError instanceof Error ? originalError.message : 'Unknown error';
    super(`Transaction store unavailable during ${operation}: ${reason}`, 503, true, 'STORE_UNAVAILABLE');
    this.operation = operation;
    this.originalError = originalError;
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}
