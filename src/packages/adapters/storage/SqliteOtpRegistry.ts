/**
 * SqliteOtpRegistry - Passcode Registry on better-sqlite3
 *
 * A record is consumable while used = 0 and now <= expires_at. `used` only
 * ever moves 0 -> 1, inside the same immediate transaction that found the
 * record, so concurrent submissions of one code yield a single acceptance.
 *
 * @module packages/adapters/storage/SqliteOtpRegistry
 */

import type Database from 'better-sqlite3';
import type { IOtpRegistry, OtpRecord, OtpConsumeResult } from '../../core/ports/IOtpRegistry.js';
import { unixSeconds, fromUnixSeconds } from '../../../db/timestamps.js';
import { normalizeEmail, maskEmail } from '../../../utils/email.js';
import { ValidationError, wrapDatabaseError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

const CODE_PATTERN = /^[0-9]{6}$/;

interface OtpRow {
  id: number;
  email: string;
  code: string;
  issued_at: number;
  expires_at: number;
  used: number;
}

function rowToRecord(row: OtpRow): OtpRecord {
  return {
    id: row.id,
    email: row.email,
    code: row.code,
    issuedAt: fromUnixSeconds(row.issued_at),
    expiresAt: fromUnixSeconds(row.expires_at),
    used: row.used === 1,
  };
}

export class SqliteOtpRegistry implements IOtpRegistry {
  constructor(private readonly db: Database.Database) {}

  async issue(email: string, code: string, ttlSeconds: number, now: Date = new Date()): Promise<OtpRecord> {
    if (!CODE_PATTERN.test(code)) {
      throw new ValidationError('Passcode must be exactly 6 digits', 'code');
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new ValidationError('Passcode lifetime must be a positive number of seconds', 'ttlSeconds');
    }

    const normalized = normalizeEmail(email);
    const issuedAt = unixSeconds(now);
    const expiresAt = issuedAt + ttlSeconds;

    return wrapDatabaseError(() => {
      const result = this.db
        .prepare(
          `INSERT INTO otp_codes (email, code, issued_at, expires_at, used)
           VALUES (?, ?, ?, ?, 0)`
        )
        .run(normalized, code, issuedAt, expiresAt);

      logger.debug({ email: maskEmail(normalized), expiresAt }, 'Issued passcode');

      return rowToRecord({
        id: Number(result.lastInsertRowid),
        email: normalized,
        code,
        issued_at: issuedAt,
        expires_at: expiresAt,
        used: 0,
      });
    }, 'issueOtp');
  }

  async consume(email: string, code: string, now: Date = new Date()): Promise<OtpConsumeResult> {
    if (!CODE_PATTERN.test(code)) {
      return 'not_found';
    }
    const normalized = normalizeEmail(email);
    const ts = unixSeconds(now);

    return wrapDatabaseError(() => {
      const run = this.db.transaction((): OtpConsumeResult => {
        // Prefer a still-valid record when an old expired one shares the code
        const row = this.db
          .prepare(
            `SELECT id, email, code, issued_at, expires_at, used FROM otp_codes
             WHERE email = ? AND code = ? AND used = 0
             ORDER BY expires_at DESC
             LIMIT 1`
          )
          .get(normalized, code) as OtpRow | undefined;

        if (!row) {
          return 'not_found';
        }
        if (ts > row.expires_at) {
          return 'expired';
        }

        const marked = this.db
          .prepare('UPDATE otp_codes SET used = 1 WHERE id = ? AND used = 0')
          .run(row.id);
        return marked.changes === 1 ? 'accepted' : 'not_found';
      });
      const outcome = run.immediate();
      logger.info({ email: maskEmail(normalized), outcome }, 'Passcode verification');
      return outcome;
    }, 'consumeOtp');
  }

  async purgeExpired(before: Date): Promise<number> {
    return wrapDatabaseError(() => {
      const result = this.db
        .prepare('DELETE FROM otp_codes WHERE expires_at < ?')
        .run(unixSeconds(before));
      if (result.changes > 0) {
        logger.info({ removed: result.changes }, 'Purged expired passcodes');
      }
      return result.changes;
    }, 'purgeExpiredOtps');
  }
}
