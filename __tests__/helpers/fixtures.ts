import { Decimal } from 'decimal.js';
import type { Transaction } from '../../src/matching/types';

const BASE_CREATED_AT = Date.parse('2024-06-01T00:00:00.000Z');

let sequence = 0;

/**
 * Builds a pending transaction. Each call gets a later createdAt than the
 * previous one unless one is given.
 */
export function buildTransaction(
  overrides: Partial<Omit<Transaction, 'amount'>> & { amount?: string } = {}
): Transaction {
  sequence++;
  const { amount, ...rest } = overrides;
  const createdAt = overrides.createdAt ?? new Date(BASE_CREATED_AT + sequence * 1000);

  return {
    id: `tx-${String(sequence).padStart(4, '0')}`,
    provider: 'xero',
    externalId: `EXT-${sequence}`,
    currency: 'USD',
    description: null,
    reference: null,
    transactionDate: '2024-01-01',
    status: 'pending',
    matchedTransactionId: null,
    updatedAt: createdAt,
    ...rest,
    amount: new Decimal(amount ?? '100.00'),
    createdAt,
  };
}
