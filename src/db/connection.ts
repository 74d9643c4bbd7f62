import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { ACCOUNTS_SCHEMA_SQL } from './migrations/001_accounts.js';
import { OTP_CODES_SCHEMA_SQL } from './migrations/002_otp_codes.js';

/**
 * Ordered schema migrations. Append only; applied versions are recorded in
 * schema_migrations so each runs once per database.
 */
export const MIGRATIONS: ReadonlyArray<{ version: number; name: string; sql: string }> = [
  { version: 1, name: 'accounts', sql: ACCOUNTS_SCHEMA_SQL },
  { version: 2, name: 'otp_codes', sql: OTP_CODES_SCHEMA_SQL },
];

let db: Database.Database | null = null;

/**
 * Apply connection pragmas shared by the bot and the web app
 *
 * WAL lets readers proceed during a write; busy_timeout makes a second writer
 * wait for the lock instead of failing with SQLITE_BUSY straight away.
 */
export function configureConnection(database: Database.Database): void {
  database.pragma('journal_mode = WAL');
  database.pragma('busy_timeout = 5000');
  database.pragma('foreign_keys = ON');
}

/**
 * Apply pending migrations inside one transaction
 */
export function runMigrations(database: Database.Database): number {
  database.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);

  const applied = new Set(
    (database.prepare('SELECT version FROM schema_migrations').all() as Array<{ version: number }>)
      .map((row) => row.version)
  );

  const pending = MIGRATIONS.filter((m) => !applied.has(m.version));
  if (pending.length === 0) {
    return 0;
  }

  const record = database.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)');
  database.transaction(() => {
    for (const migration of pending) {
      database.exec(migration.sql);
      record.run(migration.version, migration.name);
      logger.info({ version: migration.version, name: migration.name }, 'Applied migration');
    }
  })();

  return pending.length;
}

/**
 * Open an isolated, fully migrated database (":memory:" by default)
 */
export function openDatabase(path: string = ':memory:'): Database.Database {
  const database = new Database(path);
  configureConnection(database);
  runMigrations(database);
  return database;
}

/**
 * Initialize the shared database connection
 */
export function initDatabase(): Database.Database {
  if (db) {
    return db;
  }

  // Ensure data directory exists
  const dbPath = config.database.path;
  if (dbPath !== ':memory:') {
    const dbDir = dirname(dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  db = openDatabase(dbPath);
  logger.info({ path: dbPath }, 'Database initialized');
  return db;
}

/**
 * Get the shared database connection
 * @throws Error if initDatabase() has not been called
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Close the shared database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
