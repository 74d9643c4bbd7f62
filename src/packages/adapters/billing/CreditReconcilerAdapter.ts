/**
 * CreditReconcilerAdapter - Credit Merge & Spend on better-sqlite3
 *
 * Implements ICreditReconciler with:
 * - BEGIN IMMEDIATE transactions, so the web app and the bot serialize on the
 *   SQLite write lock (busy_timeout covers the wait)
 * - Merge of a chat placeholder into a verified web account, with the
 *   conservation check run before commit
 * - Spend that drains free credits before paid ones, guarded so no counter
 *   goes below zero
 *
 * @module packages/adapters/billing/CreditReconcilerAdapter
 */

import type Database from 'better-sqlite3';
import type { Account } from '../../core/ports/IAccountStore.js';
import { totalCredits } from '../../core/ports/IAccountStore.js';
import type {
  ICreditReconciler,
  MergeParams,
  MergeResult,
  SpendResult,
  CreditSource,
} from '../../core/ports/ICreditReconciler.js';
import { ACCOUNT_COLUMNS, rowToAccount, type AccountRow } from '../storage/accountRows.js';
import { unixSeconds } from '../../../db/timestamps.js';
import { normalizeEmail, maskEmail } from '../../../utils/email.js';
import {
  AccountNotFoundError,
  ConservationViolationError,
  LinkIntegrityError,
  wrapDatabaseError,
} from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

// =============================================================================
// CreditReconcilerAdapter
// =============================================================================

export class CreditReconcilerAdapter implements ICreditReconciler {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(db: Database.Database, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  // ---------------------------------------------------------------------------
  // Merge
  // ---------------------------------------------------------------------------

  async merge(params: MergeParams): Promise<MergeResult> {
    const email = normalizeEmail(params.email);
    const { telegramUserId } = params;
    const username = params.telegramUsername ?? null;

    return wrapDatabaseError(() => {
      const run = this.db.transaction((): MergeResult => {
        const ts = unixSeconds(this.now());

        const web = this.selectOne('email = ? AND is_placeholder = 0', email);
        if (!web) {
          throw new AccountNotFoundError(maskEmail(email));
        }
        if (web.telegramUserId !== null && web.telegramUserId !== telegramUserId) {
          throw new LinkIntegrityError(
            'Web account is already bound to another chat identity',
            [web.id]
          );
        }

        const chat = this.selectOne('telegram_user_id = ?', telegramUserId);
        const preTotal = totalCredits(web) + (chat && chat.id !== web.id ? totalCredits(chat) : 0);

        let result: MergeResult;

        if (!chat) {
          this.bind(web.id, telegramUserId, username, ts);
          result = {
            outcome: 'bound_only',
            account: this.requireById(web.id),
            removedAccountId: null,
            transferred: { freeCredits: 0, paidCredits: 0 },
          };
        } else if (chat.id === web.id) {
          this.bind(web.id, telegramUserId, username ?? chat.telegramUsername, ts);
          result = {
            outcome: 'already_bound',
            account: this.requireById(web.id),
            removedAccountId: null,
            transferred: { freeCredits: 0, paidCredits: 0 },
          };
        } else if (!chat.isPlaceholder) {
          // Two real accounts claim this person; never resolve by overwriting
          throw new LinkIntegrityError(
            'Chat identity is bound to a different verified account',
            [chat.id, web.id]
          );
        } else {
          // Delete first: telegram_user_id is UNIQUE
          this.db.prepare('DELETE FROM accounts WHERE id = ?').run(chat.id);
          this.db
            .prepare(
              `UPDATE accounts SET
                 free_credits = free_credits + ?,
                 paid_credits = paid_credits + ?,
                 total_queries = total_queries + ?,
                 last_query_at = MAX(COALESCE(last_query_at, 0), COALESCE(?, 0)),
                 updated_at = ?
               WHERE id = ?`
            )
            .run(
              chat.freeCredits,
              chat.paidCredits,
              chat.totalQueries,
              chat.lastQueryAt === null ? null : unixSeconds(chat.lastQueryAt),
              ts,
              web.id
            );
          // Neither side ever queried: keep NULL rather than 0
          this.db
            .prepare('UPDATE accounts SET last_query_at = NULL WHERE id = ? AND last_query_at = 0')
            .run(web.id);
          this.bind(web.id, telegramUserId, username ?? chat.telegramUsername, ts);
          result = {
            outcome: 'merged',
            account: this.requireById(web.id),
            removedAccountId: chat.id,
            transferred: { freeCredits: chat.freeCredits, paidCredits: chat.paidCredits },
          };
        }

        const postTotal = totalCredits(result.account);
        if (postTotal !== preTotal) {
          throw new ConservationViolationError(preTotal, postTotal);
        }
        return result;
      });

      const result = run.immediate();
      logger.info(
        {
          accountId: result.account.id,
          telegramUserId,
          outcome: result.outcome,
          removedAccountId: result.removedAccountId,
          transferred: result.transferred,
        },
        'Linked chat identity to web account'
      );
      return result;
    }, 'mergeAccounts');
  }

  // ---------------------------------------------------------------------------
  // Spend
  // ---------------------------------------------------------------------------

  async spend(telegramUserId: string, now: Date = this.now()): Promise<SpendResult> {
    return wrapDatabaseError(() => {
      const run = this.db.transaction((): SpendResult => {
        const account = this.selectOne('telegram_user_id = ?', telegramUserId);
        if (!account) {
          return { ok: false, reason: 'no_account' };
        }
        if (totalCredits(account) <= 0) {
          return { ok: false, reason: 'no_credits', account };
        }

        const source: CreditSource = account.freeCredits > 0 ? 'free' : 'paid';
        const column = source === 'free' ? 'free_credits' : 'paid_credits';
        const ts = unixSeconds(now);
        const updated = this.db
          .prepare(
            `UPDATE accounts SET
               ${column} = ${column} - 1,
               total_queries = total_queries + 1,
               last_query_at = ?,
               updated_at = ?
             WHERE id = ? AND ${column} > 0`
          )
          .run(ts, ts, account.id);

        if (updated.changes !== 1) {
          return { ok: false, reason: 'no_credits', account: this.requireById(account.id) };
        }
        return { ok: true, source, account: this.requireById(account.id) };
      });

      const result = run.immediate();
      if (result.ok) {
        logger.info(
          {
            accountId: result.account.id,
            source: result.source,
            remaining: totalCredits(result.account),
          },
          'Spent one credit'
        );
      }
      return result;
    }, 'spendCredit');
  }

  async refund(accountId: string, source: CreditSource): Promise<Account> {
    const column = source === 'free' ? 'free_credits' : 'paid_credits';
    return wrapDatabaseError(() => {
      const run = this.db.transaction((): Account => {
        const updated = this.db
          .prepare(`UPDATE accounts SET ${column} = ${column} + 1, updated_at = ? WHERE id = ?`)
          .run(unixSeconds(this.now()), accountId);
        if (updated.changes !== 1) {
          throw new AccountNotFoundError(accountId);
        }
        return this.requireById(accountId);
      });
      const account = run.immediate();
      logger.info({ accountId, source }, 'Refunded one credit');
      return account;
    }, 'refundCredit');
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private bind(accountId: string, telegramUserId: string, username: string | null, ts: number): void {
    this.db
      .prepare(
        `UPDATE accounts SET
           telegram_user_id = ?,
           telegram_username = ?,
           email_verified = 1,
           updated_at = ?
         WHERE id = ?`
      )
      .run(telegramUserId, username, ts, accountId);
  }

  private selectOne(where: string, ...values: string[]): Account | null {
    const row = this.db
      .prepare(`SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE ${where}`)
      .get(...values) as AccountRow | undefined;
    return row ? rowToAccount(row) : null;
  }

  private requireById(id: string): Account {
    const account = this.selectOne('id = ?', id);
    if (!account) {
      throw new AccountNotFoundError(id);
    }
    return account;
  }
}

/**
 * Factory function
 */
export function createCreditReconciler(db: Database.Database): CreditReconcilerAdapter {
  return new CreditReconcilerAdapter(db);
}
