/**
 * LinkingEngine driven end to end over in-memory stores and a fake notifier
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/db/index.js';
import { SqliteAccountStore } from '../../../src/packages/adapters/storage/SqliteAccountStore.js';
import { SqliteOtpRegistry } from '../../../src/packages/adapters/storage/SqliteOtpRegistry.js';
import { CreditReconcilerAdapter } from '../../../src/packages/adapters/billing/CreditReconcilerAdapter.js';
import type { ICreditReconciler } from '../../../src/packages/core/ports/ICreditReconciler.js';
import { VerificationService } from '../../../src/services/VerificationService.js';
import { DatabaseError } from '../../../src/utils/errors.js';
import { LinkingEngine, LinkSessionStore, LinkState, linkSessionKey } from '../../../src/packages/linking/index.js';

const CODE = '482913';
const KEY = linkSessionKey(1001, 1001);
const TG = '1001';

describe('LinkingEngine', () => {
  let db: Database.Database;
  let accounts: SqliteAccountStore;
  let reconciler: CreditReconcilerAdapter;
  let sessions: LinkSessionStore;
  let engine: LinkingEngine;
  const sendPasscode = vi.fn<(email: string, code: string) => Promise<boolean>>();

  function buildEngine(
    overrides: { reconciler?: ICreditReconciler; registry?: SqliteOtpRegistry } = {}
  ): LinkingEngine {
    const registry = overrides.registry ?? new SqliteOtpRegistry(db);
    const verification = new VerificationService(registry, { sendPasscode }, { generateCode: () => CODE });
    return new LinkingEngine({
      accounts,
      reconciler: overrides.reconciler ?? reconciler,
      verification,
      sessions,
    });
  }

  beforeEach(async () => {
    db = openDatabase();
    accounts = new SqliteAccountStore(db);
    reconciler = new CreditReconcilerAdapter(db);
    sessions = new LinkSessionStore();
    sendPasscode.mockReset();
    sendPasscode.mockResolvedValue(true);
    engine = buildEngine();

    await accounts.ensurePlaceholder({ telegramUserId: TG, telegramUsername: 'bob_tg', freeCredits: 1 });
    await accounts.createWebAccount({ email: 'bob@example.com', freeCredits: 0, paidCredits: 3 });
  });

  afterEach(() => {
    db.close();
  });

  it('links and merges credits through the full conversation', async () => {
    expect(await engine.begin(KEY, TG)).toEqual({ kind: 'awaiting_email' });
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_EMAIL);

    expect(await engine.handleText(KEY, TG, 'not-an-email')).toEqual({ kind: 'invalid_email' });
    expect(await engine.handleText(KEY, TG, 'ghost@example.com')).toEqual({
      kind: 'account_not_found',
      email: 'ghost@example.com',
    });
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_EMAIL);

    expect(await engine.handleText(KEY, TG, ' Bob@Example.com ')).toEqual({ kind: 'code_sent', email: 'bob@example.com' });
    expect(sendPasscode).toHaveBeenCalledWith('bob@example.com', CODE);
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_CODE);

    expect(await engine.handleText(KEY, TG, '12ab')).toEqual({ kind: 'invalid_code' });
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_CODE);

    expect(await engine.handleText(KEY, TG, CODE, 'bob_tg')).toEqual({
      kind: 'linked',
      email: 'bob@example.com',
      freeCredits: 1,
      paidCredits: 3,
      merged: true,
    });
    expect(engine.stateOf(KEY)).toBe(LinkState.IDLE);

    const linked = await accounts.findByTelegramId(TG);
    expect(linked).toMatchObject({ email: 'bob@example.com', isPlaceholder: false, freeCredits: 1, paidCredits: 3 });
  });

  it('answers already_linked on repeated /link without touching credits', async () => {
    await engine.begin(KEY, TG);
    await engine.handleText(KEY, TG, 'bob@example.com');
    await engine.handleText(KEY, TG, CODE);
    const before = await accounts.findByTelegramId(TG);

    expect(await engine.begin(KEY, TG)).toEqual({ kind: 'already_linked', email: 'bob@example.com' });
    expect(await engine.begin(KEY, TG)).toEqual({ kind: 'already_linked', email: 'bob@example.com' });

    expect(engine.stateOf(KEY)).toBe(LinkState.IDLE);
    expect(await accounts.findByTelegramId(TG)).toEqual(before);
  });

  it('cancels on a wrong code and leaves credits alone', async () => {
    await engine.begin(KEY, TG);
    await engine.handleText(KEY, TG, 'bob@example.com');

    expect(await engine.handleText(KEY, TG, '000000')).toEqual({ kind: 'verification_failed', reason: 'not_found' });
    expect(engine.stateOf(KEY)).toBe(LinkState.IDLE);
    expect((await accounts.findByTelegramId(TG))?.isPlaceholder).toBe(true);
  });

  it('refuses an email already linked to another chat', async () => {
    await reconciler.merge({ telegramUserId: '9999', email: 'bob@example.com' });

    await engine.begin(KEY, TG);
    expect(await engine.handleText(KEY, TG, 'bob@example.com')).toEqual({ kind: 'email_taken' });
    expect(engine.stateOf(KEY)).toBe(LinkState.IDLE);
    expect(sendPasscode).not.toHaveBeenCalled();
  });

  it('stays waiting for the email when the code cannot be sent', async () => {
    sendPasscode.mockResolvedValue(false);
    await engine.begin(KEY, TG);

    expect(await engine.handleText(KEY, TG, 'bob@example.com')).toEqual({ kind: 'code_send_failed' });
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_EMAIL);

    sendPasscode.mockResolvedValue(true);
    expect(await engine.handleText(KEY, TG, 'bob@example.com')).toEqual({ kind: 'code_sent', email: 'bob@example.com' });
  });

  it('reports an integrity error when the web account is claimed mid-flow', async () => {
    await engine.begin(KEY, TG);
    await engine.handleText(KEY, TG, 'bob@example.com');
    await reconciler.merge({ telegramUserId: '7777', email: 'bob@example.com' });

    expect(await engine.handleText(KEY, TG, CODE)).toEqual({ kind: 'link_integrity_error' });
    expect(engine.stateOf(KEY)).toBe(LinkState.IDLE);
    expect((await accounts.findByTelegramId(TG))?.freeCredits).toBe(1);
    expect((await accounts.findByEmail('bob@example.com'))?.paidCredits).toBe(3);
  });

  it('reports link_failed when the merge hits a store failure', async () => {
    const failing: ICreditReconciler = {
      merge: vi.fn().mockRejectedValue(new Error('disk I/O error')),
      spend: vi.fn(),
      refund: vi.fn(),
    };
    engine = buildEngine({ reconciler: failing });

    await engine.begin(KEY, TG);
    await engine.handleText(KEY, TG, 'bob@example.com');
    expect(await engine.handleText(KEY, TG, CODE)).toEqual({ kind: 'link_failed' });
    expect(engine.stateOf(KEY)).toBe(LinkState.IDLE);
  });

  it('stays on the code step when the store cannot check the code', async () => {
    const registry = new SqliteOtpRegistry(db);
    engine = buildEngine({ registry });

    await engine.begin(KEY, TG);
    await engine.handleText(KEY, TG, 'bob@example.com');
    vi.spyOn(registry, 'consume').mockRejectedValueOnce(new DatabaseError('database is locked', 'SQLITE_BUSY'));

    expect(await engine.handleText(KEY, TG, CODE)).toEqual({ kind: 'verification_unavailable' });
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_CODE);

    const retried = await engine.handleText(KEY, TG, CODE);
    expect(retried).toMatchObject({ kind: 'linked', email: 'bob@example.com', paidCredits: 3 });
  });

  it('restarts when /link is sent mid-flow', async () => {
    await engine.begin(KEY, TG);
    await engine.handleText(KEY, TG, 'bob@example.com');

    expect(await engine.begin(KEY, TG)).toEqual({ kind: 'awaiting_email' });
    expect(engine.stateOf(KEY)).toBe(LinkState.AWAITING_EMAIL);
  });

  it('cancels an open conversation and ignores text afterwards', async () => {
    expect(engine.cancel(KEY)).toEqual({ kind: 'nothing_to_cancel' });

    await engine.begin(KEY, TG);
    expect(engine.hasOpenSession(KEY)).toBe(true);
    expect(engine.cancel(KEY)).toEqual({ kind: 'cancelled' });
    expect(engine.hasOpenSession(KEY)).toBe(false);
    expect(await engine.handleText(KEY, TG, 'bob@example.com')).toBeNull();
  });
});
