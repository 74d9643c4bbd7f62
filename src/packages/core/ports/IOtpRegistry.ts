/**
 * IOtpRegistry - One-Time Passcode Registry Port
 *
 * Durable, short-lived passcode records keyed by email.
 *
 * @module packages/core/ports/IOtpRegistry
 */

export interface OtpRecord {
  id: number;
  email: string;
  code: string;
  issuedAt: Date;
  expiresAt: Date;
  used: boolean;
}

/**
 * accepted  - matched an unused, unexpired record and marked it used
 * not_found - no unused record with this email and code
 * expired   - matched an unused record whose expiry has passed (left unused)
 */
export type OtpConsumeResult = 'accepted' | 'not_found' | 'expired';

export interface IOtpRegistry {
  /** Persist a new passcode; earlier codes for the same email stay valid */
  issue(email: string, code: string, ttlSeconds: number, now?: Date): Promise<OtpRecord>;

  /**
   * Check-and-mark in one atomic step. Of several concurrent calls with the
   * same valid code at most one returns 'accepted'.
   */
  consume(email: string, code: string, now?: Date): Promise<OtpConsumeResult>;

  /** Delete records that expired before the given time; returns rows removed */
  purgeExpired(before: Date): Promise<number>;
}
