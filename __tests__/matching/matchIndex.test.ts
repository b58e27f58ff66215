/**
 * Tests for the in-memory pending-transaction index
 */

import { MatchIndex } from '../../src/matching/matchIndex';
import { AppError } from '../../src/utils/AppError';
import { buildTransaction } from '../helpers/fixtures';

describe('MatchIndex', () => {
  let index: MatchIndex;

  beforeEach(() => {
    index = new MatchIndex();
  });

  const xero = (overrides: Parameters<typeof buildTransaction>[0] = {}) =>
    buildTransaction({ provider: 'xero', transactionDate: '2024-01-10', ...overrides });
  const quickbooks = (overrides: Parameters<typeof buildTransaction>[0] = {}) =>
    buildTransaction({ provider: 'quickbooks', transactionDate: '2024-01-10', ...overrides });

  describe('insert / remove', () => {
    it('should track size and membership', () => {
      const a = xero();
      const b = quickbooks();

      index.insert(a);
      index.insert(b);

      expect(index.size).toBe(2);
      expect(index.has(a.id)).toBe(true);

      index.remove(a);

      expect(index.size).toBe(1);
      expect(index.has(a.id)).toBe(false);
    });

    it('should replace an entry when the same id is inserted again', () => {
      const a = xero();

      index.insert(a);
      index.insert({ ...a, transactionDate: '2024-02-01' });

      expect(index.size).toBe(1);
      expect([...index.query(quickbooks({ transactionDate: '2024-01-10' }))]).toEqual([]);
      expect([...index.query(quickbooks({ transactionDate: '2024-02-01' }))]).toEqual([a.id]);
    });

    it('should ignore removal of an unknown id', () => {
      index.insert(xero());

      index.remove({ id: 'does-not-exist' });

      expect(index.size).toBe(1);
    });

    it('should refuse matched transactions', () => {
      const matched = xero({ status: 'matched', matchedTransactionId: 'other' });

      expect(() => index.insert(matched)).toThrow(AppError);
      expect(index.size).toBe(0);
    });
  });

  describe('query', () => {
    it('should only return the opposite provider in the same currency', () => {
      const target = xero();
      const sameProvider = xero();
      const otherCurrency = quickbooks({ currency: 'EUR' });
      const counterpart = quickbooks();

      index.hydrate([target, sameProvider, otherCurrency, counterpart]);

      expect([...index.query(target)]).toEqual([counterpart.id]);
    });

    it('should never return the transaction itself', () => {
      const target = xero();
      index.insert(target);

      expect([...index.query(target)]).toEqual([]);
    });

    it('should include the ±3 day window edges and nothing beyond', () => {
      const target = xero({ transactionDate: '2024-01-10' });
      const early = quickbooks({ transactionDate: '2024-01-07' });
      const late = quickbooks({ transactionDate: '2024-01-13' });
      const tooEarly = quickbooks({ transactionDate: '2024-01-06' });
      const tooLate = quickbooks({ transactionDate: '2024-01-14' });

      index.hydrate([tooEarly, early, late, tooLate]);

      expect(new Set(index.query(target))).toEqual(new Set([early.id, late.id]));
    });

    it('should rank by date distance, then amount distance, then createdAt', () => {
      const target = xero({ amount: '100.00', transactionDate: '2024-01-10' });
      const twoDaysExact = quickbooks({ amount: '100.00', transactionDate: '2024-01-12' });
      const sameDayOffByCent = quickbooks({ amount: '100.01', transactionDate: '2024-01-10' });
      const sameDayExactLater = quickbooks({
        amount: '100.00',
        transactionDate: '2024-01-10',
        createdAt: new Date('2024-07-02T00:00:00Z'),
      });
      const sameDayExactEarlier = quickbooks({
        amount: '100.00',
        transactionDate: '2024-01-10',
        createdAt: new Date('2024-07-01T00:00:00Z'),
      });

      index.hydrate([twoDaysExact, sameDayOffByCent, sameDayExactLater, sameDayExactEarlier]);

      expect([...index.query(target)]).toEqual([
        sameDayExactEarlier.id,
        sameDayExactLater.id,
        sameDayOffByCent.id,
        twoDaysExact.id,
      ]);
    });

    it('should not filter on amount', () => {
      const target = xero({ amount: '100.00' });
      const farAmount = quickbooks({ amount: '5000.00' });

      index.insert(farAmount);

      expect([...index.query(target)]).toEqual([farAmount.id]);
    });

    it('should be unaffected by removals after the query was taken', () => {
      const target = xero();
      const first = quickbooks({ transactionDate: '2024-01-10' });
      const second = quickbooks({ transactionDate: '2024-01-11' });
      index.hydrate([first, second]);

      const candidates = index.query(target);
      index.remove(first);

      expect([...candidates]).toEqual([first.id, second.id]);
      expect([...index.query(target)]).toEqual([second.id]);
    });
  });

  describe('hydrate', () => {
    it('should replace the contents and report the new size', () => {
      index.insert(xero());

      const size = index.hydrate([quickbooks(), quickbooks()]);

      expect(size).toBe(2);
      expect(index.size).toBe(2);
    });

    it('should empty the index on clear', () => {
      index.hydrate([xero(), quickbooks()]);

      index.clear();

      expect(index.size).toBe(0);
    });
  });
});
