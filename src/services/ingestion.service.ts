/**
 * Ingestion Gateway
 *
 * Validates incoming provider records, persists them as pending, indexes
 * them and immediately attempts reconciliation. This is the only place new
 * transactions enter the system.
 */

import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { AMOUNT_DECIMAL_PLACES, PROVIDERS, isCalendarDate } from '../matching';
import type { MatchIndex, ReconcileResult, Transaction } from '../matching';
import type { TransactionStore } from '../store/transactionStore';
import { AppError, logger } from '../utils';
import type { ReconciliationEngine } from './reconciliation.service';

// ============================================
// Validation
// ============================================

const amountSchema = z
  .union([z.string().trim().min(1), z.number()])
  .transform((value, ctx) => {
    let amount: Decimal;
    try {
      amount = new Decimal(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount: "${value}"` });
      return z.NEVER;
    }

    if (!amount.isFinite() || amount.lte(0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be a positive number' });
      return z.NEVER;
    }
    if (amount.decimalPlaces() > AMOUNT_DECIMAL_PLACES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Amount must have at most ${AMOUNT_DECIMAL_PLACES} decimal places`,
      });
      return z.NEVER;
    }

    return amount;
  });

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((value) => (value ? value : null));

export const transactionInputSchema = z.object({
  provider: z.enum(PROVIDERS),
  externalId: z.string().trim().min(1, 'externalId is required').max(255),
  amount: amountSchema,
  currency: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter ISO code')),
  transactionDate: z
    .string()
    .trim()
    .refine(isCalendarDate, 'transactionDate must be a valid YYYY-MM-DD date'),
  description: optionalText(500),
  reference: optionalText(255),
});

export type TransactionInput = z.input<typeof transactionInputSchema>;

// ============================================
// Types
// ============================================

export interface IngestionResult {
  transaction: Transaction;
  reconciliation: ReconcileResult;
}

export interface BatchIngestionFailure {
  rowNumber: number;
  error: string;
}

export interface BatchIngestionResult {
  imported: number;
  matched: number;
  failed: BatchIngestionFailure[];
}

// ============================================
// Gateway
// ============================================

export class IngestionGateway {
  constructor(
    private readonly store: TransactionStore,
    private readonly index: MatchIndex,
    private readonly engine: ReconciliationEngine
  ) {}

  /**
   * Validates, stores and reconciles a single provider record.
   *
   * @throws AppError 400 on invalid input, 409 on a duplicate provider id
   */
  async ingest(input: unknown): Promise<IngestionResult> {
    const parsed = transactionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw AppError.validation(parsed.error);
    }

    const created = await this.store.create(parsed.data);
    this.index.insert(created);

    logger.debug(
      `📥 Ingested ${created.provider} ${created.externalId} as ${created.id} ` +
        `(${created.currency} ${created.amount.toFixed(AMOUNT_DECIMAL_PLACES)} on ${created.transactionDate})`
    );

    const reconciliation = await this.engine.reconcile(created.id);

    const transaction =
      reconciliation.status === 'matched' ? (await this.store.get(created.id)) ?? created : created;

    return { transaction, reconciliation };
  }

  /**
   * Ingests records one after another. Rejected rows (invalid or duplicate)
   * are reported and skipped; any other failure aborts the batch.
   *
   * Row numbers are 1-based positions in `inputs` unless provided.
   */
  async ingestMany(
    inputs: ReadonlyArray<{ rowNumber?: number; input: unknown }>
  ): Promise<BatchIngestionResult> {
    const result: BatchIngestionResult = { imported: 0, matched: 0, failed: [] };

    for (const [position, { rowNumber, input }] of inputs.entries()) {
      try {
        const { reconciliation } = await this.ingest(input);
        result.imported++;
        if (reconciliation.status === 'matched') {
          result.matched++;
        }
      } catch (error) {
        if (error instanceof AppError && error.isOperational && error.statusCode < 500) {
          result.failed.push({ rowNumber: rowNumber ?? position + 1, error: error.message });
          continue;
        }
        throw error;
      }
    }

    logger.info(
      `📥 Batch ingestion complete: ${result.imported} imported, ${result.matched} matched, ${result.failed.length} rejected`
    );

    return result;
  }
}

export default IngestionGateway;
