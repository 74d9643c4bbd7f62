/**
 * CreditReconcilerAdapter: merge and spend against an in-memory database
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../src/db/index.js';
import { SqliteAccountStore } from '../../src/packages/adapters/storage/SqliteAccountStore.js';
import { CreditReconcilerAdapter } from '../../src/packages/adapters/billing/CreditReconcilerAdapter.js';
import { isLinked, totalCredits } from '../../src/packages/core/ports/IAccountStore.js';
import { AccountNotFoundError, LinkIntegrityError } from '../../src/utils/errors.js';

const NOW = new Date('2026-03-01T10:00:00Z');

describe('CreditReconcilerAdapter', () => {
  let db: Database.Database;
  let store: SqliteAccountStore;
  let reconciler: CreditReconcilerAdapter;

  beforeEach(() => {
    db = openDatabase();
    store = new SqliteAccountStore(db, () => NOW);
    reconciler = new CreditReconcilerAdapter(db, () => NOW);
  });

  afterEach(() => {
    db.close();
  });

  function accountCount(): number {
    const row = db.prepare('SELECT COUNT(*) AS n FROM accounts').get();
    return row && typeof row === 'object' && 'n' in row && typeof row.n === 'number' ? row.n : -1;
  }

  // ---------------------------------------------------------------------------
  // Merge
  // ---------------------------------------------------------------------------

  describe('merge', () => {
    it('folds a chat placeholder into the web account (bob@example.com)', async () => {
      const { account: placeholder } = await store.ensurePlaceholder({
        telegramUserId: '1001',
        telegramUsername: 'bob_tg',
        freeCredits: 1,
      });
      const web = await store.createWebAccount({ email: 'bob@example.com', freeCredits: 0, paidCredits: 3 });

      const result = await reconciler.merge({ telegramUserId: '1001', email: 'bob@example.com' });

      expect(result.outcome).toBe('merged');
      expect(result.removedAccountId).toBe(placeholder.id);
      expect(result.transferred).toEqual({ freeCredits: 1, paidCredits: 0 });
      expect(result.account).toMatchObject({
        id: web.id,
        telegramUserId: '1001',
        telegramUsername: 'bob_tg',
        email: 'bob@example.com',
        emailVerified: true,
        freeCredits: 1,
        paidCredits: 3,
      });
      expect(isLinked(result.account)).toBe(true);

      expect(await store.findById(placeholder.id)).toBeNull();
      expect((await store.findByTelegramId('1001'))?.id).toBe(web.id);
      expect(accountCount()).toBe(1);
    });

    it('conserves credits and carries usage history', async () => {
      await store.ensurePlaceholder({ telegramUserId: '1001', freeCredits: 2 });
      await store.addPaidCredits((await store.findByTelegramId('1001'))?.id ?? '', 4);
      await reconciler.spend('1001', new Date('2026-02-01T00:00:00Z'));
      await store.createWebAccount({ email: 'bob@example.com', freeCredits: 1, paidCredits: 2 });

      const before =
        totalCredits((await store.findByTelegramId('1001')) ?? { freeCredits: 0, paidCredits: 0 }) +
        totalCredits((await store.findByEmail('bob@example.com')) ?? { freeCredits: 0, paidCredits: 0 });

      const { account } = await reconciler.merge({ telegramUserId: '1001', email: 'bob@example.com' });

      expect(before).toBe(8);
      expect(totalCredits(account)).toBe(before);
      expect(account.freeCredits).toBe(2);
      expect(account.paidCredits).toBe(6);
      expect(account.totalQueries).toBe(1);
      expect(account.lastQueryAt).toEqual(new Date('2026-02-01T00:00:00Z'));
    });

    it('binds a chat identity that has no account yet', async () => {
      const web = await store.createWebAccount({ email: 'bob@example.com', paidCredits: 2 });

      const result = await reconciler.merge({ telegramUserId: '2002', telegramUsername: 'bob', email: 'bob@example.com' });

      expect(result.outcome).toBe('bound_only');
      expect(result.account).toMatchObject({ id: web.id, telegramUserId: '2002', emailVerified: true, paidCredits: 2 });
      expect(result.account.lastQueryAt).toBeNull();
    });

    it('is idempotent when the identity is already bound to the account', async () => {
      await store.ensurePlaceholder({ telegramUserId: '1001', freeCredits: 1 });
      await store.createWebAccount({ email: 'bob@example.com', paidCredits: 3 });
      await reconciler.merge({ telegramUserId: '1001', email: 'bob@example.com' });

      const again = await reconciler.merge({ telegramUserId: '1001', email: 'bob@example.com' });

      expect(again.outcome).toBe('already_bound');
      expect(again.transferred).toEqual({ freeCredits: 0, paidCredits: 0 });
      expect(again.account.freeCredits).toBe(1);
      expect(again.account.paidCredits).toBe(3);
    });

    it('refuses a web account bound to another chat identity', async () => {
      await store.createWebAccount({ email: 'bob@example.com', paidCredits: 3 });
      await reconciler.merge({ telegramUserId: '1001', email: 'bob@example.com' });
      await store.ensurePlaceholder({ telegramUserId: '3003', freeCredits: 1 });

      await expect(reconciler.merge({ telegramUserId: '3003', email: 'bob@example.com' })).rejects.toBeInstanceOf(
        LinkIntegrityError
      );

      expect((await store.findByTelegramId('3003'))?.freeCredits).toBe(1);
      expect((await store.findByEmail('bob@example.com'))?.paidCredits).toBe(3);
    });

    it('never overwrites a second verified account', async () => {
      await store.createWebAccount({ email: 'first@example.com', paidCredits: 5 });
      await reconciler.merge({ telegramUserId: '1001', email: 'first@example.com' });
      await store.createWebAccount({ email: 'second@example.com', paidCredits: 2 });

      await expect(reconciler.merge({ telegramUserId: '1001', email: 'second@example.com' })).rejects.toBeInstanceOf(
        LinkIntegrityError
      );

      expect((await store.findByEmail('first@example.com'))?.paidCredits).toBe(5);
      expect((await store.findByEmail('second@example.com'))?.telegramUserId).toBeNull();
      expect(accountCount()).toBe(2);
    });

    it('fails when no account holds the email', async () => {
      await expect(reconciler.merge({ telegramUserId: '1001', email: 'ghost@example.com' })).rejects.toBeInstanceOf(
        AccountNotFoundError
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Spend
  // ---------------------------------------------------------------------------

  describe('spend', () => {
    it('takes free credits before paid ones', async () => {
      const { account } = await store.ensurePlaceholder({ telegramUserId: '1001', freeCredits: 1 });
      await store.addPaidCredits(account.id, 1);

      const first = await reconciler.spend('1001');
      expect(first.ok && first.source).toBe('free');
      const second = await reconciler.spend('1001');
      expect(second.ok && second.source).toBe('paid');
    });

    it('spends free=0, paid=1 once and then rejects without mutation', async () => {
      const { account } = await store.ensurePlaceholder({ telegramUserId: '1001', freeCredits: 0 });
      await store.addPaidCredits(account.id, 1);

      const spent = await reconciler.spend('1001', NOW);
      expect(spent.ok).toBe(true);
      if (spent.ok) {
        expect(spent.source).toBe('paid');
        expect(spent.account).toMatchObject({ freeCredits: 0, paidCredits: 0, totalQueries: 1 });
        expect(spent.account.lastQueryAt).toEqual(NOW);
      }

      const rejected = await reconciler.spend('1001', new Date(NOW.getTime() + 60_000));
      expect(rejected.ok).toBe(false);
      if (!rejected.ok && rejected.reason === 'no_credits') {
        expect(rejected.account).toMatchObject({ freeCredits: 0, paidCredits: 0, totalQueries: 1 });
        expect(rejected.account.lastQueryAt).toEqual(NOW);
      } else {
        expect.unreachable();
      }
    });

    it('never overdraws under concurrent spends', async () => {
      const { account } = await store.ensurePlaceholder({ telegramUserId: '1001', freeCredits: 2 });
      await store.addPaidCredits(account.id, 1);

      const results = await Promise.all(Array.from({ length: 10 }, () => reconciler.spend('1001')));

      expect(results.filter((r) => r.ok)).toHaveLength(3);
      const final = await store.findById(account.id);
      expect(final).toMatchObject({ freeCredits: 0, paidCredits: 0, totalQueries: 3 });
    });

    it('reports a missing account', async () => {
      expect(await reconciler.spend('404')).toEqual({ ok: false, reason: 'no_account' });
    });
  });

  describe('refund', () => {
    it('returns the unit to its bucket and keeps the query count', async () => {
      const { account } = await store.ensurePlaceholder({ telegramUserId: '1001', freeCredits: 0 });
      await store.addPaidCredits(account.id, 1);
      await reconciler.spend('1001');

      const refunded = await reconciler.refund(account.id, 'paid');

      expect(refunded).toMatchObject({ freeCredits: 0, paidCredits: 1, totalQueries: 1 });
    });

    it('fails for an unknown account', async () => {
      await expect(reconciler.refund('missing', 'free')).rejects.toBeInstanceOf(AccountNotFoundError);
    });
  });
});
