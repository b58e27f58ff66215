/**
 * In-memory index of pending transactions.
 *
 * Partitioned by (currency, provider); each partition is kept sorted by
 * transaction date, then amount, then createdAt, so a date window is a
 * contiguous slice found by binary search.
 *
 * Every operation is synchronous. Callers on the event loop therefore always
 * see a transaction either fully indexed or fully removed.
 */

import type { Decimal } from 'decimal.js';
import { AppError } from '../utils/AppError';
import { DATE_WINDOW_DAYS, PROVIDERS } from './constants';
import { toDayNumber } from './dateProximity';
import { compareCandidates } from './matchPredicate';
import type { MatchableTransaction, Provider } from './types';

interface IndexEntry {
  readonly id: string;
  readonly provider: Provider;
  readonly currency: string;
  readonly dayNumber: number;
  readonly transactionDate: string;
  readonly amount: Decimal;
  readonly createdAt: Date;
}

const partitionKey = (currency: string, provider: Provider): string => `${currency}:${provider}`;

function compareEntries(left: IndexEntry, right: IndexEntry): number {
  if (left.dayNumber !== right.dayNumber) {
    return left.dayNumber - right.dayNumber;
  }

  const amountOrder = left.amount.comparedTo(right.amount);
  if (amountOrder !== 0) {
    return amountOrder;
  }

  const createdOrder = left.createdAt.getTime() - right.createdAt.getTime();
  if (createdOrder !== 0) {
    return createdOrder;
  }

  return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
}

/**
 * First position in a sorted partition whose entry satisfies `isAfter`.
 */
function lowerBound(partition: IndexEntry[], isAfter: (entry: IndexEntry) => boolean): number {
  let low = 0;
  let high = partition.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (isAfter(partition[mid])) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return low;
}

export class MatchIndex {
  private readonly partitions = new Map<string, IndexEntry[]>();
  private readonly entriesById = new Map<string, IndexEntry>();

  /**
   * Adds a pending transaction. Re-inserting an indexed id replaces its entry.
   */
  insert(transaction: MatchableTransaction): void {
    if (transaction.status !== 'pending') {
      throw AppError.internal(
        `Cannot index transaction ${transaction.id} with status "${transaction.status}"`
      );
    }

    this.remove(transaction);

    const entry: IndexEntry = {
      id: transaction.id,
      provider: transaction.provider,
      currency: transaction.currency,
      dayNumber: toDayNumber(transaction.transactionDate),
      transactionDate: transaction.transactionDate,
      amount: transaction.amount,
      createdAt: transaction.createdAt,
    };

    const key = partitionKey(entry.currency, entry.provider);
    let partition = this.partitions.get(key);
    if (!partition) {
      partition = [];
      this.partitions.set(key, partition);
    }

    const position = lowerBound(partition, (existing) => compareEntries(existing, entry) > 0);
    partition.splice(position, 0, entry);
    this.entriesById.set(entry.id, entry);
  }

  /**
   * Removes a transaction from its partition. No-op if absent.
   */
  remove(transaction: Pick<MatchableTransaction, 'id'>): void {
    const entry = this.entriesById.get(transaction.id);
    if (!entry) {
      return;
    }

    const key = partitionKey(entry.currency, entry.provider);
    const partition = this.partitions.get(key);
    if (partition) {
      const position = lowerBound(partition, (existing) => compareEntries(existing, entry) >= 0);
      if (partition[position]?.id === entry.id) {
        partition.splice(position, 1);
      }
      if (partition.length === 0) {
        this.partitions.delete(key);
      }
    }

    this.entriesById.delete(entry.id);
  }

  has(transactionId: string): boolean {
    return this.entriesById.has(transactionId);
  }

  get size(): number {
    return this.entriesById.size;
  }

  /**
   * Candidate ids for a transaction: opposite-provider entries of the same
   * currency dated within ±DATE_WINDOW_DAYS, ordered by date distance, then
   * amount distance, then createdAt.
   *
   * The window is captured when `query` is called; each iteration of the
   * returned sequence ranks that snapshot afresh and yields ids one at a time.
   */
  query(transaction: Pick<MatchableTransaction, 'id' | 'provider' | 'currency' | 'transactionDate' | 'amount'>): Iterable<string> {
    const day = toDayNumber(transaction.transactionDate);
    const window: IndexEntry[] = [];

    for (const provider of PROVIDERS) {
      if (provider === transaction.provider) continue;

      const partition = this.partitions.get(partitionKey(transaction.currency, provider));
      if (!partition) continue;

      const start = lowerBound(partition, (entry) => entry.dayNumber >= day - DATE_WINDOW_DAYS);
      for (let i = start; i < partition.length && partition[i].dayNumber <= day + DATE_WINDOW_DAYS; i++) {
        if (partition[i].id !== transaction.id) {
          window.push(partition[i]);
        }
      }
    }

    return {
      *[Symbol.iterator]() {
        const ranked = [...window].sort((left, right) => compareCandidates(transaction, left, right));
        for (const entry of ranked) {
          yield entry.id;
        }
      },
    };
  }

  /**
   * Replaces the index contents with the given pending transactions.
   */
  hydrate(transactions: Iterable<MatchableTransaction>): number {
    this.clear();
    for (const transaction of transactions) {
      this.insert(transaction);
    }
    return this.size;
  }

  clear(): void {
    this.partitions.clear();
    this.entriesById.clear();
  }
}

export default MatchIndex;
