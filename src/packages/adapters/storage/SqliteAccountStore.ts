/**
 * SqliteAccountStore - Account Store on better-sqlite3
 *
 * Lookups plus the two single-row writes that do not need the reconciler:
 * placeholder creation on first contact and out-of-band paid top-ups.
 *
 * @module packages/adapters/storage/SqliteAccountStore
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import type {
  Account,
  IAccountStore,
  CreatePlaceholderParams,
  CreateWebAccountParams,
  EnsureAccountResult,
} from '../../core/ports/IAccountStore.js';
import { ACCOUNT_COLUMNS, rowToAccount, type AccountRow } from './accountRows.js';
import { unixSeconds } from '../../../db/timestamps.js';
import { normalizeEmail } from '../../../utils/email.js';
import {
  AccountNotFoundError,
  ConflictError,
  ValidationError,
  wrapDatabaseError,
} from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

export class SqliteAccountStore implements IAccountStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(db: Database.Database, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  async findById(id: string): Promise<Account | null> {
    return wrapDatabaseError(() => this.selectOne('id = ?', id), 'findById');
  }

  async findByTelegramId(telegramUserId: string): Promise<Account | null> {
    return wrapDatabaseError(
      () => this.selectOne('telegram_user_id = ?', telegramUserId),
      'findByTelegramId'
    );
  }

  async findByEmail(email: string): Promise<Account | null> {
    return wrapDatabaseError(
      () => this.selectOne('email = ? AND is_placeholder = 0', normalizeEmail(email)),
      'findByEmail'
    );
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async ensurePlaceholder(params: CreatePlaceholderParams): Promise<EnsureAccountResult> {
    const { telegramUserId, freeCredits } = params;
    const username = params.telegramUsername ?? null;
    if (!Number.isInteger(freeCredits) || freeCredits < 0) {
      throw new ValidationError('Sign-up grant must be a non-negative integer', 'freeCredits');
    }

    return wrapDatabaseError(() => {
      const run = this.db.transaction((): EnsureAccountResult => {
        const ts = unixSeconds(this.now());
        const inserted = this.db
          .prepare(
            `INSERT INTO accounts
               (id, telegram_user_id, telegram_username, email, is_placeholder,
                email_verified, free_credits, paid_credits, created_at, updated_at)
             VALUES (?, ?, ?, NULL, 1, 0, ?, 0, ?, ?)
             ON CONFLICT(telegram_user_id) DO NOTHING`
          )
          .run(randomUUID(), telegramUserId, username, freeCredits, ts, ts);

        if (inserted.changes === 0 && username !== null) {
          // Keep the stored handle current; never touches balances
          this.db
            .prepare(
              `UPDATE accounts SET telegram_username = ?, updated_at = ?
               WHERE telegram_user_id = ? AND (telegram_username IS NULL OR telegram_username != ?)`
            )
            .run(username, ts, telegramUserId, username);
        }

        const account = this.selectOne('telegram_user_id = ?', telegramUserId);
        if (!account) {
          throw new AccountNotFoundError(`telegram:${telegramUserId}`);
        }
        return { account, created: inserted.changes === 1 };
      });
      const result = run.immediate();
      if (result.created) {
        logger.info(
          { accountId: result.account.id, telegramUserId, freeCredits },
          'Created placeholder account'
        );
      }
      return result;
    }, 'ensurePlaceholder');
  }

  async createWebAccount(params: CreateWebAccountParams): Promise<Account> {
    const email = normalizeEmail(params.email);
    const freeCredits = params.freeCredits ?? 0;
    const paidCredits = params.paidCredits ?? 0;
    if (freeCredits < 0 || paidCredits < 0) {
      throw new ValidationError('Credit balances cannot be negative');
    }

    return wrapDatabaseError(() => {
      const run = this.db.transaction((): Account => {
        const existing = this.selectOne('email = ?', email);
        if (existing) {
          throw new ConflictError('An account with this email already exists');
        }
        const id = randomUUID();
        const ts = unixSeconds(this.now());
        this.db
          .prepare(
            `INSERT INTO accounts
               (id, telegram_user_id, email, is_placeholder, email_verified,
                free_credits, paid_credits, created_at, updated_at)
             VALUES (?, NULL, ?, 0, 0, ?, ?, ?, ?)`
          )
          .run(id, email, freeCredits, paidCredits, ts, ts);
        const account = this.selectOne('id = ?', id);
        if (!account) {
          throw new AccountNotFoundError(id);
        }
        return account;
      });
      return run.immediate();
    }, 'createWebAccount');
  }

  async addPaidCredits(accountId: string, amount: number): Promise<Account> {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new ValidationError('Top-up amount must be a positive integer', 'amount');
    }

    return wrapDatabaseError(() => {
      const run = this.db.transaction((): Account => {
        const result = this.db
          .prepare('UPDATE accounts SET paid_credits = paid_credits + ?, updated_at = ? WHERE id = ?')
          .run(amount, unixSeconds(this.now()), accountId);
        const account = result.changes === 1 ? this.selectOne('id = ?', accountId) : null;
        if (!account) {
          throw new AccountNotFoundError(accountId);
        }
        return account;
      });
      const account = run.immediate();
      logger.info({ accountId, amount, paidCredits: account.paidCredits }, 'Added paid credits');
      return account;
    }, 'addPaidCredits');
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private selectOne(where: string, value: string): Account | null {
    const row = this.db
      .prepare(`SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE ${where}`)
      .get(value) as AccountRow | undefined;
    return row ? rowToAccount(row) : null;
  }
}
