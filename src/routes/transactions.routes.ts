/**
 * Transaction API Routes
 *
 * Ingestion, lookup and manual reconciliation of provider transactions.
 * These routes handle HTTP concerns only; the gateway, engine and
 * transaction service own the behaviour.
 *
 * Endpoints:
 * - POST /           - Ingest one transaction (reconciled immediately)
 * - POST /import     - Ingest a CSV export
 * - GET /            - List transactions (filter by status, provider)
 * - GET /:id         - Get one transaction
 * - POST /:id/reconcile - Manually trigger reconciliation
 */

import { Router, Request, Response } from 'express';
import multer from 'multer';
import { join } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { unlink } from 'fs/promises';
import type { Transaction } from '../matching';
import type { IngestionGateway } from '../services/ingestion.service';
import type { ReconciliationEngine } from '../services/reconciliation.service';
import type { TransactionService } from '../services/transaction.service';
import { commonSchemas, validateRequest } from '../middlewares';
import { asyncHandler, sendSuccess, AppError, logger } from '../utils';
import { parseCsvFile, type ParsedCsvFile } from '../utils/csv';

export interface TransactionRouteDependencies {
  gateway: IngestionGateway;
  engine: ReconciliationEngine;
  transactions: TransactionService;
  uploadsDir?: string;
}

/**
 * JSON shape of a transaction: amounts as two-decimal strings, timestamps as ISO
 */
export function serializeTransaction(transaction: Transaction) {
  return {
    id: transaction.id,
    provider: transaction.provider,
    externalId: transaction.externalId,
    amount: transaction.amount.toFixed(2),
    currency: transaction.currency,
    description: transaction.description,
    reference: transaction.reference,
    transactionDate: transaction.transactionDate,
    status: transaction.status,
    matchedTransactionId: transaction.matchedTransactionId,
    createdAt: transaction.createdAt.toISOString(),
    updatedAt: transaction.updatedAt.toISOString(),
  };
}

export function createTransactionRoutes(deps: TransactionRouteDependencies): Router {
  const router = Router();

  // ============================================
  // Multer Configuration
  // ============================================

  const uploadsDir = deps.uploadsDir ?? join(process.cwd(), 'uploads');
  if (!existsSync(uploadsDir)) {
    mkdirSync(uploadsDir, { recursive: true });
  }

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, uploadsDir);
    },
    filename: (_req, _file, cb) => {
      const uniqueSuffix = `${Date.now()}-${Math.round(Math.random() * 1e9)}`;
      cb(null, `provider_transactions_${uniqueSuffix}.csv`);
    },
  });

  const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain'];
    const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
    const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

    if (mimeTypeOk || extensionOk) {
      cb(null, true);
    } else {
      cb(AppError.badRequest('Only CSV files are allowed'));
    }
  };

  const upload = multer({
    storage,
    fileFilter,
    limits: {
      fileSize: 10 * 1024 * 1024, // 10MB max
    },
  });

  // ============================================
  // Routes
  // ============================================

  /**
   * @route   POST /api/v1/transactions
   * @desc    Ingest a provider transaction and attempt reconciliation
   *
   * Response:
   * - 201 Created: { transaction, reconciliation }
   * - 400 Bad Request: Validation failed
   * - 409 Conflict: Provider record already ingested
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { transaction, reconciliation } = await deps.gateway.ingest(req.body);

      sendSuccess(
        res,
        { transaction: serializeTransaction(transaction), reconciliation },
        reconciliation.status === 'matched'
          ? 'Transaction ingested and matched'
          : 'Transaction ingested, awaiting counterpart',
        201
      );
    })
  );

  /**
   * @route   POST /api/v1/transactions/import
   * @desc    Ingest every row of a provider CSV export
   *
   * Request:
   * - Content-Type: multipart/form-data
   * - Field name: "file"
   * - Columns: provider, external_id, amount, currency, transaction_date[, description, reference]
   *
   * Response:
   * - 200 OK: { imported, matched, failed: [{ rowNumber, error }] }
   */
  router.post(
    '/import',
    upload.single('file'),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const file = req.file;
      if (!file) {
        throw AppError.badRequest('No file uploaded. Please upload a CSV file in the "file" field.');
      }

      logger.info(`📥 CSV import received: ${file.originalname} (${file.size} bytes)`);

      try {
        let parsed: ParsedCsvFile;
        try {
          parsed = await parseCsvFile(file.path);
        } catch (error) {
          throw AppError.badRequest(error instanceof Error ? error.message : 'Unreadable CSV file');
        }

        const result = await deps.gateway.ingestMany(parsed.rows);
        const failed = [...parsed.errors, ...result.failed].sort((a, b) => a.rowNumber - b.rowNumber);

        sendSuccess(
          res,
          { imported: result.imported, matched: result.matched, failed },
          `Imported ${result.imported} of ${parsed.stats.total} rows`
        );
      } finally {
        await unlink(file.path).catch((error: unknown) => {
          logger.warn(
            `Could not remove upload ${file.path}: ${error instanceof Error ? error.message : 'Unknown error'}`
          );
        });
      }
    })
  );

  /**
   * @route   GET /api/v1/transactions
   * @desc    List transactions, newest transaction date first
   *
   * Query params:
   * - status: pending | matched
   * - provider: xero | quickbooks
   */
  router.get(
    '/',
    validateRequest({ query: commonSchemas.transactionFilter }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const filter = commonSchemas.transactionFilter.parse(req.query);
      const transactions = await deps.transactions.listTransactions(filter);

      sendSuccess(
        res,
        transactions.map(serializeTransaction),
        `Retrieved ${transactions.length} transactions`
      );
    })
  );

  /**
   * @route   GET /api/v1/transactions/:id
   * @desc    Get a single transaction
   */
  router.get(
    '/:id',
    validateRequest({ params: commonSchemas.id }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const transaction = await deps.transactions.getTransaction(req.params.id);
      sendSuccess(res, serializeTransaction(transaction));
    })
  );

  /**
   * @route   POST /api/v1/transactions/:id/reconcile
   * @desc    Manually trigger reconciliation
   *
   * Idempotent: an already-matched transaction returns its existing match.
   *
   * Response:
   * - 200 OK: { status, matchedTransactionId? }
   * - 404 Not Found: Transaction not found
   */
  router.post(
    '/:id/reconcile',
    validateRequest({ params: commonSchemas.id }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const result = await deps.engine.reconcile(req.params.id);

      sendSuccess(
        res,
        result,
        result.status === 'matched' ? 'Transaction is matched' : 'No counterpart found yet'
      );
    })
  );

  return router;
}

export default createTransactionRoutes;
