/**
 * Verification Service
 *
 * Issues and checks one-time passcodes: draws the code, persists it through
 * the OTP registry, then hands it to the notifier.
 */

import { randomInt } from 'crypto';
import type { IOtpRegistry, OtpConsumeResult } from '../packages/core/ports/IOtpRegistry.js';
import type { INotifier } from '../packages/core/ports/INotifier.js';
import { OTP_EXPIRY_SECONDS } from '../db/index.js';
import { maskEmail, normalizeEmail } from '../utils/email.js';
import { logError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Uniform 6-digit code without a leading zero (100000..999999)
 */
export function generatePasscode(): string {
  return String(randomInt(100000, 1000000));
}

export interface VerificationServiceOptions {
  ttlSeconds?: number;
  generateCode?: () => string;
  now?: () => Date;
}

export class VerificationService {
  private readonly ttlSeconds: number;
  private readonly generateCode: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly registry: IOtpRegistry,
    private readonly notifier: INotifier,
    options: VerificationServiceOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? OTP_EXPIRY_SECONDS;
    this.generateCode = options.generateCode ?? generatePasscode;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Issue a passcode for the email and deliver it.
   * Returns false when either persistence or delivery failed.
   */
  async issueCode(email: string): Promise<boolean> {
    const normalized = normalizeEmail(email);
    const code = this.generateCode();

    try {
      await this.registry.issue(normalized, code, this.ttlSeconds, this.now());
    } catch (error) {
      logError(error, { operation: 'issuePasscode', email: normalized });
      return false;
    }

    try {
      const delivered = await this.notifier.sendPasscode(normalized, code);
      if (!delivered) {
        logger.warn({ email: maskEmail(normalized) }, 'Passcode was not delivered');
      }
      return delivered;
    } catch (error) {
      logError(error, { operation: 'sendPasscode', email: normalized });
      return false;
    }
  }

  /**
   * Check-and-mark a submitted code. Store failures propagate.
   */
  async verifyCode(email: string, code: string, now: Date = this.now()): Promise<OtpConsumeResult> {
    return this.registry.consume(normalizeEmail(email), code.trim(), now);
  }

  /**
   * Housekeeping: drop records that expired before the given time
   */
  async purgeExpired(before: Date): Promise<number> {
    return this.registry.purgeExpired(before);
  }
}
