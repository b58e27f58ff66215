/**
 * Tests for the SQLite transaction store
 *
 * Each test runs against a fresh in-memory database with the real schema.
 */

import { Decimal } from 'decimal.js';
import { closeDatabase, createDatabase, migrateToLatest } from '../../src/database';
import type { KyselyDB } from '../../src/database';
import type { NewTransaction, PairUpdate } from '../../src/store';
import { SqliteTransactionStore } from '../../src/store';
import { AppError, ConstraintViolationError } from '../../src/utils';

describe('SqliteTransactionStore', () => {
  let db: KyselyDB;
  let store: SqliteTransactionStore;
  let clock: number;
  let nextId: number;

  beforeEach(async () => {
    db = createDatabase(':memory:');
    await migrateToLatest(db);

    clock = Date.parse('2024-06-01T12:00:00.000Z');
    nextId = 0;
    store = new SqliteTransactionStore(db, {
      now: () => new Date((clock += 1000)),
      generateId: () => `id-${++nextId}`,
    });
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  const input = (overrides: Partial<NewTransaction> = {}): NewTransaction => ({
    provider: 'xero',
    externalId: `EXT-${nextId + 1}`,
    amount: new Decimal('100.5'),
    currency: 'USD',
    transactionDate: '2024-01-15',
    ...overrides,
  });

  const pairOf = (aId: string, bId: string): PairUpdate => ({
    a: { id: aId, expectedStatus: 'pending', next: { status: 'matched', matchedTransactionId: bId } },
    b: { id: bId, expectedStatus: 'pending', next: { status: 'matched', matchedTransactionId: aId } },
  });

  describe('create / get', () => {
    it('should persist a pending transaction and read it back', async () => {
      const created = await store.create(
        input({ externalId: 'XR-1', description: 'Transfer to subsidiary', reference: 'IC-7' })
      );

      expect(created).toEqual({
        id: 'id-1',
        provider: 'xero',
        externalId: 'XR-1',
        amount: new Decimal('100.50'),
        currency: 'USD',
        description: 'Transfer to subsidiary',
        reference: 'IC-7',
        transactionDate: '2024-01-15',
        status: 'pending',
        matchedTransactionId: null,
        createdAt: new Date('2024-06-01T12:00:01.000Z'),
        updatedAt: new Date('2024-06-01T12:00:01.000Z'),
      });
      expect(await store.get('id-1')).toEqual(created);
    });

    it('should store amounts with two decimal places', async () => {
      const created = await store.create(input({ amount: new Decimal('42') }));

      const row = await db
        .selectFrom('transactions')
        .select('amount')
        .where('id', '=', created.id)
        .executeTakeFirstOrThrow();

      expect(row.amount).toBe('42.00');
    });

    it('should return null for an unknown id', async () => {
      expect(await store.get('nope')).toBeNull();
    });

    it('should reject the same provider record twice with a 409', async () => {
      await store.create(input({ externalId: 'XR-9' }));

      const duplicate = store.create(input({ externalId: 'XR-9' }));

      await expect(duplicate).rejects.toBeInstanceOf(AppError);
      await expect(store.create(input({ externalId: 'XR-9' }))).rejects.toMatchObject({
        statusCode: 409,
        message: 'Transaction XR-9 from xero has already been ingested',
      });
    });

    it('should allow the same external id from different providers', async () => {
      await store.create(input({ provider: 'xero', externalId: 'SHARED' }));

      await expect(
        store.create(input({ provider: 'quickbooks', externalId: 'SHARED' }))
      ).resolves.toMatchObject({ provider: 'quickbooks' });
    });
  });

  describe('list', () => {
    it('should filter by status and provider, newest date first', async () => {
      const older = await store.create(input({ externalId: 'A', transactionDate: '2024-01-01' }));
      const newer = await store.create(input({ externalId: 'B', transactionDate: '2024-01-03' }));
      const qb = await store.create(input({ provider: 'quickbooks', externalId: 'C' }));
      await store.atomicUpdatePair(pairOf(newer.id, qb.id));

      const all = await store.list();
      const pendingXero = await store.list({ status: 'pending', provider: 'xero' });
      const matched = await store.list({ status: 'matched' });

      expect(all.map((t) => t.id)).toEqual([qb.id, newer.id, older.id]);
      expect(pendingXero.map((t) => t.id)).toEqual([older.id]);
      expect(matched.map((t) => t.id).sort()).toEqual([newer.id, qb.id].sort());
    });
  });

  describe('atomicUpdatePair', () => {
    it('should link both records when both are pending', async () => {
      const a = await store.create(input({ externalId: 'A' }));
      const b = await store.create(input({ provider: 'quickbooks', externalId: 'B' }));

      const result = await store.atomicUpdatePair(pairOf(a.id, b.id));

      expect(result).toBe('success');
      expect(await store.get(a.id)).toMatchObject({ status: 'matched', matchedTransactionId: b.id });
      expect(await store.get(b.id)).toMatchObject({ status: 'matched', matchedTransactionId: a.id });
    });

    it('should change neither record when one is no longer pending', async () => {
      const a = await store.create(input({ externalId: 'A' }));
      const b = await store.create(input({ provider: 'quickbooks', externalId: 'B' }));
      const c = await store.create(input({ externalId: 'C' }));
      await store.atomicUpdatePair(pairOf(b.id, c.id));

      const result = await store.atomicUpdatePair(pairOf(a.id, b.id));

      expect(result).toBe('conflict');
      expect(await store.get(a.id)).toMatchObject({ status: 'pending', matchedTransactionId: null });
      expect(await store.get(b.id)).toMatchObject({ status: 'matched', matchedTransactionId: c.id });
    });

    it('should leave the first side untouched when the second is taken', async () => {
      const a = await store.create(input({ externalId: 'A' }));
      const b = await store.create(input({ provider: 'quickbooks', externalId: 'B' }));
      const c = await store.create(input({ externalId: 'C' }));
      await store.atomicUpdatePair(pairOf(b.id, c.id));

      const result = await store.atomicUpdatePair(pairOf(a.id, b.id));

      expect(result).toBe('conflict');
      expect((await store.get(a.id))?.status).toBe('pending');
    });

    it('should report a conflict for an unknown id', async () => {
      const a = await store.create(input({ externalId: 'A' }));

      await expect(store.atomicUpdatePair(pairOf(a.id, 'ghost'))).resolves.toBe('conflict');
      expect((await store.get(a.id))?.status).toBe('pending');
    });

    it('should raise a constraint violation when stored links are inconsistent', async () => {
      const a = await store.create(input({ externalId: 'A' }));
      const b = await store.create(input({ provider: 'quickbooks', externalId: 'B' }));
      const c = await store.create(input({ externalId: 'C' }));
      // `c` claims `b` while `b` itself still reads as pending
      await db
        .updateTable('transactions')
        .set({ status: 'matched', matched_transaction_id: b.id })
        .where('id', '=', c.id)
        .execute();

      await expect(store.atomicUpdatePair(pairOf(a.id, b.id))).rejects.toBeInstanceOf(
        ConstraintViolationError
      );
      expect((await store.get(a.id))?.status).toBe('pending');
    });

    it('should refuse to pair a record with itself', async () => {
      const a = await store.create(input({ externalId: 'A' }));

      await expect(store.atomicUpdatePair(pairOf(a.id, a.id))).rejects.toBeInstanceOf(
        ConstraintViolationError
      );
    });

    it('should let exactly one of two concurrent claims win', async () => {
      const target = await store.create(input({ provider: 'quickbooks', externalId: 'T' }));
      const first = await store.create(input({ externalId: 'F' }));
      const second = await store.create(input({ externalId: 'S' }));

      const results = await Promise.all([
        store.atomicUpdatePair(pairOf(first.id, target.id)),
        store.atomicUpdatePair(pairOf(second.id, target.id)),
      ]);

      expect([...results].sort()).toEqual(['conflict', 'success']);
      const matched = await store.list({ status: 'matched' });
      expect(matched).toHaveLength(2);
    });
  });

  describe('schema constraints', () => {
    it('should reject a matched row without a counterpart', async () => {
      const a = await store.create(input({ externalId: 'A' }));

      await expect(
        db.updateTable('transactions').set({ status: 'matched' }).where('id', '=', a.id).execute()
      ).rejects.toThrow();
    });
  });
});
