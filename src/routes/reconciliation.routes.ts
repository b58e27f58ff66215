/**
 * Reconciliation API Routes
 *
 * Endpoints:
 * - GET /summary - Counts by status and provider
 * - POST /sweep  - Enqueue a background re-run over all pending transactions
 */

import { Router, Request, Response } from 'express';
import type { TransactionService } from '../services/transaction.service';
import type { SweepScheduler } from '../workers/reconciliation.queue';
import { commonSchemas, validateRequest } from '../middlewares';
import { asyncHandler, sendSuccess, AppError } from '../utils';

export interface ReconciliationRouteDependencies {
  transactions: TransactionService;
  sweepScheduler: SweepScheduler | null;
}

export function createReconciliationRoutes(deps: ReconciliationRouteDependencies): Router {
  const router = Router();

  /**
   * @route   GET /api/v1/reconciliation/summary
   * @desc    Reconciliation counts by status and provider
   */
  router.get(
    '/summary',
    asyncHandler(async (_req: Request, res: Response): Promise<void> => {
      const summary = await deps.transactions.getSummary();
      sendSuccess(res, summary);
    })
  );

  /**
   * @route   POST /api/v1/reconciliation/sweep
   * @desc    Reconcile every pending transaction in the background
   *
   * Response:
   * - 202 Accepted: { jobId }
   * - 503 Service Unavailable: No queue configured
   */
  router.post(
    '/sweep',
    validateRequest({ body: commonSchemas.sweepRequest }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      if (!deps.sweepScheduler) {
        throw AppError.serviceUnavailable('Background sweeps are not available');
      }

      const { requestedBy } = commonSchemas.sweepRequest.parse(req.body);
      const jobId = await deps.sweepScheduler.enqueueSweep(requestedBy);

      sendSuccess(res, { jobId }, 'Reconciliation sweep enqueued', 202);
    })
  );

  return router;
}

export default createReconciliationRoutes;
