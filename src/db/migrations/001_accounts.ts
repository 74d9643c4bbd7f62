/**
 * Migration 001: Accounts
 *
 * One row per end user, shared by the Telegram bot and the web app.
 *
 * Identity Model:
 * - id is the stable internal key
 * - telegram_user_id binds the chat identity (unique when present)
 * - email binds the web identity (unique when present, NULL for placeholders)
 * - is_placeholder marks rows created from chat that have not been linked yet
 */

export const ACCOUNTS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS accounts (
  id TEXT PRIMARY KEY,
  telegram_user_id TEXT UNIQUE,
  telegram_username TEXT,
  email TEXT UNIQUE,
  is_placeholder INTEGER NOT NULL DEFAULT 0 CHECK (is_placeholder IN (0, 1)),
  email_verified INTEGER NOT NULL DEFAULT 0 CHECK (email_verified IN (0, 1)),
  free_credits INTEGER NOT NULL DEFAULT 0 CHECK (free_credits >= 0),
  paid_credits INTEGER NOT NULL DEFAULT 0 CHECK (paid_credits >= 0),
  total_queries INTEGER NOT NULL DEFAULT 0 CHECK (total_queries >= 0),
  last_query_at INTEGER,
  created_at INTEGER NOT NULL DEFAULT (unixepoch()),
  updated_at INTEGER NOT NULL DEFAULT (unixepoch()),
  -- A placeholder never carries an email; a real account always does
  CHECK ((is_placeholder = 1 AND email IS NULL) OR (is_placeholder = 0 AND email IS NOT NULL))
);

CREATE INDEX IF NOT EXISTS idx_accounts_telegram
  ON accounts(telegram_user_id);
`;

export const ACCOUNTS_ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_accounts_telegram;
DROP TABLE IF EXISTS accounts;
`;
