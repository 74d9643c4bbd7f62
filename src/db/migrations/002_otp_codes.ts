/**
 * Migration 002: One-time passcodes
 *
 * Passcodes are keyed by email. Several outstanding codes per email are
 * allowed; a code is consumable while used = 0 and unixepoch() <= expires_at.
 * Expired rows are harmless and only purged for housekeeping.
 */

export const OTP_CODES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS otp_codes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  email TEXT NOT NULL,
  code TEXT NOT NULL CHECK (length(code) = 6),
  issued_at INTEGER NOT NULL,
  expires_at INTEGER NOT NULL,
  used INTEGER NOT NULL DEFAULT 0 CHECK (used IN (0, 1)),
  CHECK (expires_at >= issued_at)
);

-- Lookup path for verification
CREATE INDEX IF NOT EXISTS idx_otp_codes_email_code
  ON otp_codes(email, code, used);

-- Housekeeping sweep
CREATE INDEX IF NOT EXISTS idx_otp_codes_expires
  ON otp_codes(expires_at);
`;

export const OTP_CODES_ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_otp_codes_expires;
DROP INDEX IF EXISTS idx_otp_codes_email_code;
DROP TABLE IF EXISTS otp_codes;
`;

/**
 * Passcode lifetime (10 minutes)
 */
export const OTP_EXPIRY_SECONDS = 10 * 60;

/**
 * Expired passcodes older than this are removed by the housekeeping sweep
 */
export const OTP_RETENTION_SECONDS = 24 * 60 * 60;
