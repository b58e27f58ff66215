/**
 * Reconciliation Sweep Worker
 *
 * Re-runs reconciliation over every pending transaction, oldest first.
 * Useful after a bulk import or when counterparts arrived while the
 * automatic post-ingestion attempt was failing.
 */

import type { MatchIndex } from '../matching';
import type { ReconciliationEngine } from '../services/reconciliation.service';
import type { TransactionStore } from '../store/transactionStore';
import { TransactionNotFoundError, logger } from '../utils';
import type { SweepJobData, SweepResult } from './reconciliation.queue';

/**
 * The parts of a BullMQ job the sweep touches
 */
export interface SweepJob {
  id?: string;
  data: SweepJobData;
  updateProgress(progress: number): Promise<void>;
}

export interface SweepDependencies {
  store: TransactionStore;
  index: MatchIndex;
  engine: ReconciliationEngine;
}

/** How often (in transactions) progress is reported */
const PROGRESS_INTERVAL = 100;

export function createSweepProcessor(deps: SweepDependencies) {
  return async function processSweepJob(job: SweepJob): Promise<SweepResult> {
    const startTime = Date.now();
    const jobLabel = job.id ?? 'direct';

    const pending = await deps.store.list({ status: 'pending' });
    pending.sort(
      (left, right) =>
        left.createdAt.getTime() - right.createdAt.getTime() || (left.id < right.id ? -1 : 1)
    );

    // Rows written by another path must be findable before the first reconcile
    for (const transaction of pending) {
      if (!deps.index.has(transaction.id)) {
        deps.index.insert(transaction);
      }
    }

    logger.info(
      `[Job ${jobLabel}] Sweeping ${pending.length} pending transactions (requested by ${job.data.requestedBy})`
    );

    const result: SweepResult = { processed: 0, matched: 0, pending: 0, skipped: 0 };
    const counted = new Set<string>();

    for (const transaction of pending) {
      // Already paired earlier in this sweep as someone's counterpart
      if (counted.has(transaction.id)) {
        continue;
      }

      try {
        const outcome = await deps.engine.reconcile(transaction.id);
        result.processed++;

        if (outcome.status === 'matched') {
          result.matched++;
          if (outcome.matchedTransactionId) {
            counted.add(outcome.matchedTransactionId);
          }
        } else {
          result.pending++;
        }
      } catch (error) {
        if (error instanceof TransactionNotFoundError) {
          result.skipped++;
          continue;
        }
        throw error;
      }

      if (result.processed % PROGRESS_INTERVAL === 0) {
        await job.updateProgress(Math.floor((result.processed / pending.length) * 100));
      }
    }

    await job.updateProgress(100);

    logger.info(
      `[Job ${jobLabel}] ✅ Sweep complete: ${result.processed} processed, ${result.matched} matched in ${Date.now() - startTime}ms`
    );

    return result;
  };
}

export default createSweepProcessor;
