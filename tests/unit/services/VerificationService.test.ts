import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/db/index.js';
import { SqliteOtpRegistry } from '../../../src/packages/adapters/storage/SqliteOtpRegistry.js';
import { VerificationService, generatePasscode } from '../../../src/services/VerificationService.js';
import { NotifierError } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';

describe('VerificationService', () => {
  let db: Database.Database;
  let registry: SqliteOtpRegistry;
  const sendPasscode = vi.fn<(email: string, code: string) => Promise<boolean>>();

  beforeEach(() => {
    db = openDatabase();
    registry = new SqliteOtpRegistry(db);
    sendPasscode.mockReset();
  });

  afterEach(() => {
    db.close();
  });

  it('generates six-digit codes without a leading zero', () => {
    for (let i = 0; i < 200; i++) {
      const code = generatePasscode();
      expect(code).toMatch(/^[1-9][0-9]{5}$/);
    }
  });

  it('persists the code and sends it to the normalized email', async () => {
    sendPasscode.mockResolvedValue(true);
    const service = new VerificationService(registry, { sendPasscode }, { generateCode: () => '314159' });

    expect(await service.issueCode(' Bob@Example.com ')).toBe(true);
    expect(sendPasscode).toHaveBeenCalledWith('bob@example.com', '314159');
    expect(await service.verifyCode('bob@example.com', ' 314159 ')).toBe('accepted');
    expect(await service.verifyCode('bob@example.com', '314159')).toBe('not_found');
  });

  it('uses the configured lifetime', async () => {
    sendPasscode.mockResolvedValue(true);
    const service = new VerificationService(registry, { sendPasscode }, { ttlSeconds: 60, generateCode: () => '111111' });
    await service.issueCode('bob@example.com');

    const row = db.prepare('SELECT expires_at - issued_at AS ttl FROM otp_codes').get();
    expect(row).toEqual({ ttl: 60 });
  });

  it('reports failure when the notifier declines', async () => {
    sendPasscode.mockResolvedValue(false);
    const service = new VerificationService(registry, { sendPasscode });
    expect(await service.issueCode('bob@example.com')).toBe(false);
  });

  it('reports failure when the notifier throws', async () => {
    sendPasscode.mockRejectedValue(new NotifierError('Email provider error: 500', 500));
    const service = new VerificationService(registry, { sendPasscode });
    expect(await service.issueCode('bob@example.com')).toBe(false);
  });

  it('keeps the address out of failure logs', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    sendPasscode.mockRejectedValue(new NotifierError('Email provider error: 500', 500));
    const service = new VerificationService(registry, { sendPasscode });

    await service.issueCode('bob@example.com');

    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'sendPasscode', email: '[REDACTED]' }),
      'Application error'
    );
    errorSpy.mockRestore();
  });

  it('stamps issue and expiry with the injected clock', async () => {
    sendPasscode.mockResolvedValue(true);
    let current = new Date('2026-03-01T10:00:00Z');
    const service = new VerificationService(registry, { sendPasscode }, {
      ttlSeconds: 600,
      generateCode: () => '271828',
      now: () => current,
    });

    await service.issueCode('bob@example.com');
    const row = db.prepare('SELECT issued_at, expires_at FROM otp_codes').get();
    expect(row).toEqual({ issued_at: 1772359200, expires_at: 1772359800 });

    current = new Date('2026-03-01T10:10:01Z');
    expect(await service.verifyCode('bob@example.com', '271828')).toBe('expired');
  });

  it('does not notify when the code cannot be stored', async () => {
    const service = new VerificationService(registry, { sendPasscode });
    db.close();
    expect(await service.issueCode('bob@example.com')).toBe(false);
    expect(sendPasscode).not.toHaveBeenCalled();
    db = openDatabase();
  });
});
