import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/db/index.js';
import { parseConfig } from '../../../src/config.js';
import { createAppServices } from '../../../src/services/container.js';

describe('createAppServices', () => {
  let db: Database.Database;
  let current: Date;
  const sendPasscode = vi.fn<(email: string, code: string) => Promise<boolean>>();
  const generate = vi.fn<(topic: string) => Promise<string>>();

  beforeEach(() => {
    db = openDatabase();
    current = new Date('2026-03-01T10:00:00Z');
    sendPasscode.mockReset().mockResolvedValue(true);
    generate.mockReset();
  });

  afterEach(() => {
    db.close();
  });

  function build() {
    return createAppServices(db, parseConfig({}), {
      notifier: { sendPasscode },
      generator: { generate },
      now: () => current,
    });
  }

  it('uses the supplied ports instead of the HTTP adapters', () => {
    const services = build();
    expect(services.notifier.sendPasscode).toBe(sendPasscode);
    expect(services.generator.generate).toBe(generate);
  });

  it('runs account creation and passcode expiry on the injected clock', async () => {
    const services = build();
    await services.accounts.createWebAccount({ email: 'bob@example.com', paidCredits: 3 });
    const { account } = await services.accounts.ensurePlaceholder({ telegramUserId: '555', freeCredits: 1 });
    expect(account.createdAt).toEqual(current);

    expect(await services.linking.begin('555:555', '555')).toEqual({ kind: 'awaiting_email' });
    expect(await services.linking.handleText('555:555', '555', 'bob@example.com')).toEqual({
      kind: 'code_sent',
      email: 'bob@example.com',
    });

    const row = db.prepare('SELECT issued_at, expires_at FROM otp_codes').get();
    expect(row).toEqual({ issued_at: 1772359200, expires_at: 1772359800 });

    // Past the 10-minute passcode lifetime, inside the 15-minute session
    current = new Date('2026-03-01T10:11:00Z');
    const [, code] = sendPasscode.mock.calls[0];
    expect(await services.linking.handleText('555:555', '555', code)).toEqual({
      kind: 'verification_failed',
      reason: 'expired',
    });
  });
});
