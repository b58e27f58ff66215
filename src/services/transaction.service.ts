/**
 * Read-side queries over stored transactions.
 */

import type { Provider, ReconciliationStatus, Transaction } from '../matching';
import type { TransactionFilter, TransactionStore } from '../store/transactionStore';
import { TransactionNotFoundError } from '../utils';

export type StatusCounts = Record<ReconciliationStatus, number>;

export interface ReconciliationSummary {
  total: number;
  matchedPairs: number;
  byStatus: StatusCounts;
  byProvider: Record<Provider, StatusCounts>;
}

const emptyCounts = (): StatusCounts => ({ pending: 0, matched: 0 });

export class TransactionService {
  constructor(private readonly store: TransactionStore) {}

  async getTransaction(id: string): Promise<Transaction> {
    const transaction = await this.store.get(id);
    if (!transaction) {
      throw new TransactionNotFoundError(id);
    }
    return transaction;
  }

  async listTransactions(filter: TransactionFilter = {}): Promise<Transaction[]> {
    return this.store.list(filter);
  }

  async getSummary(): Promise<ReconciliationSummary> {
    const transactions = await this.store.list();

    const byStatus = emptyCounts();
    const byProvider: Record<Provider, StatusCounts> = {
      xero: emptyCounts(),
      quickbooks: emptyCounts(),
    };

    for (const transaction of transactions) {
      byStatus[transaction.status]++;
      byProvider[transaction.provider][transaction.status]++;
    }

    return {
      total: transactions.length,
      matchedPairs: Math.floor(byStatus.matched / 2),
      byStatus,
      byProvider,
    };
  }
}

export default TransactionService;
