/**
 * Reconciliation Engine
 *
 * Decides and atomically applies a match for one transaction:
 * 1. Load the transaction (404 if absent, existing match if already matched)
 * 2. Ask the MatchIndex for ranked candidates
 * 3. Check each candidate against the matching predicate, in order
 * 4. Claim the first passing candidate with a conditional pair update
 * 5. If another caller claimed it first, move on to the next candidate
 * 6. No passing candidate → pending, unless another caller paired it meanwhile
 *
 * Concurrency: any number of `reconcile` calls may run at once. Safety rests
 * on the store's compare-and-swap on both records' status, never on the
 * order calls happen to run in.
 */

import { evaluateMatch } from '../matching';
import type { MatchIndex, ReconcileResult, Transaction } from '../matching';
import type { TransactionStore } from '../store/transactionStore';
import {
  ConcurrentMatchLostError,
  ConstraintViolationError,
  TransactionNotFoundError,
  logger,
} from '../utils';

export class ReconciliationEngine {
  constructor(
    private readonly store: TransactionStore,
    private readonly index: MatchIndex
  ) {}

  /**
   * Attempts to match one transaction with a counterpart from the other provider.
   *
   * Safe to call any number of times: an already-matched transaction returns
   * its existing match without touching the store.
   *
   * @throws TransactionNotFoundError when the id does not exist
   * @throws ConstraintViolationError when a stored match is not symmetric
   */
  async reconcile(transactionId: string): Promise<ReconcileResult> {
    const transaction = await this.loadTransaction(transactionId);

    if (transaction.status === 'matched') {
      return this.existingMatch(transaction);
    }

    // Pending transactions must stay discoverable by their future counterparts
    if (!this.index.has(transaction.id)) {
      this.index.insert(transaction);
    }

    for (const candidateId of this.index.query(transaction)) {
      const candidate = await this.store.get(candidateId);

      if (!candidate || candidate.status !== 'pending') {
        this.index.remove({ id: candidateId });
        continue;
      }

      const verdict = evaluateMatch(transaction, candidate);
      if (!verdict.matches) {
        logger.debug(`[${transaction.id}] Candidate ${candidate.id} rejected: ${verdict.rejection}`);
        continue;
      }

      try {
        await this.claimPair(transaction, candidate);
      } catch (error) {
        if (!(error instanceof ConcurrentMatchLostError)) {
          throw error;
        }

        logger.debug(`[${transaction.id}] ${error.message}`);

        // We may have been the one claimed
        const current = await this.loadTransaction(transactionId);
        if (current.status === 'matched') {
          return this.existingMatch(current);
        }
        continue;
      }

      this.index.remove(transaction);
      this.index.remove(candidate);

      logger.info(
        `🔗 Matched ${transaction.provider} ${transaction.id} ↔ ${candidate.provider} ${candidate.id} ` +
          `(${transaction.currency} ${transaction.amount.toFixed(2)} / ${candidate.amount.toFixed(2)})`
      );

      return { status: 'matched', matchedTransactionId: candidate.id };
    }

    // Another caller may have paired us while we were scanning
    const current = await this.loadTransaction(transactionId);
    if (current.status === 'matched') {
      return this.existingMatch(current);
    }

    logger.debug(`[${transaction.id}] No counterpart found, remains pending`);
    return { status: 'pending' };
  }

  private async loadTransaction(transactionId: string): Promise<Transaction> {
    const transaction = await this.store.get(transactionId);
    if (!transaction) {
      throw new TransactionNotFoundError(transactionId);
    }
    return transaction;
  }

  /**
   * Links both records in one conditional update, issued in ascending id order.
   */
  private async claimPair(transaction: Transaction, candidate: Transaction): Promise<void> {
    const [first, second] =
      transaction.id < candidate.id ? [transaction, candidate] : [candidate, transaction];

    const result = await this.store.atomicUpdatePair({
      a: {
        id: first.id,
        expectedStatus: 'pending',
        next: { status: 'matched', matchedTransactionId: second.id },
      },
      b: {
        id: second.id,
        expectedStatus: 'pending',
        next: { status: 'matched', matchedTransactionId: first.id },
      },
    });

    if (result === 'conflict') {
      throw new ConcurrentMatchLostError(transaction.id, candidate.id);
    }
  }

  /**
   * Returns a stored match after checking that the counterpart points back.
   */
  private async existingMatch(transaction: Transaction): Promise<ReconcileResult> {
    this.index.remove(transaction);

    const counterpartId = transaction.matchedTransactionId;
    if (!counterpartId) {
      throw this.violation(
        `Transaction ${transaction.id} is matched but has no counterpart`,
        [transaction.id]
      );
    }

    const counterpart = await this.store.get(counterpartId);
    if (!counterpart) {
      throw this.violation(
        `Transaction ${transaction.id} is matched to missing transaction ${counterpartId}`,
        [transaction.id, counterpartId]
      );
    }

    if (counterpart.status !== 'matched' || counterpart.matchedTransactionId !== transaction.id) {
      throw this.violation(
        `Match between ${transaction.id} and ${counterpartId} is not symmetric`,
        [transaction.id, counterpartId]
      );
    }

    return { status: 'matched', matchedTransactionId: counterpartId };
  }

  private violation(message: string, transactionIds: string[]): ConstraintViolationError {
    logger.error(`❌ Constraint violation: ${message}`);
    return new ConstraintViolationError(message, transactionIds);
  }
}

export default ReconciliationEngine;
