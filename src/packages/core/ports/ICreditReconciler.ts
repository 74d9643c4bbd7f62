/**
 * ICreditReconciler - Credit Merge & Spend Port
 *
 * Every operation is a single transaction over the account rows it touches.
 *
 * Conservation Invariants:
 *   merge: post(W.free + W.paid) = pre(T.free + T.paid) + pre(W.free + W.paid)
 *   spend: post total = pre total - 1, total_queries + 1
 *   always: free_credits >= 0, paid_credits >= 0
 *
 * @module packages/core/ports/ICreditReconciler
 */

import type { Account } from './IAccountStore.js';

// =============================================================================
// Merge
// =============================================================================

export interface MergeParams {
  telegramUserId: string;
  telegramUsername?: string | null;
  /** Email just proven by passcode */
  email: string;
}

/**
 * bound_only     - the chat identity had no account; it now points at the web account
 * already_bound  - the chat identity already pointed at the web account
 * merged         - a placeholder account was folded into the web account and deleted
 */
export type MergeOutcome = 'bound_only' | 'already_bound' | 'merged';

export interface MergeResult {
  outcome: MergeOutcome;
  account: Account;
  /** Deleted placeholder id when outcome is 'merged' */
  removedAccountId: string | null;
  transferred: { freeCredits: number; paidCredits: number };
}

// =============================================================================
// Spend
// =============================================================================

export type CreditSource = 'free' | 'paid';

export type SpendResult =
  | { ok: true; account: Account; source: CreditSource }
  | { ok: false; reason: 'no_credits'; account: Account }
  | { ok: false; reason: 'no_account' };

// =============================================================================
// Port
// =============================================================================

export interface ICreditReconciler {
  /**
   * @throws AccountNotFoundError when no account holds the email
   * @throws LinkIntegrityError when either row is bound elsewhere
   */
  merge(params: MergeParams): Promise<MergeResult>;

  /** Take one credit (free first, then paid) from the account bound to the chat identity */
  spend(telegramUserId: string, now?: Date): Promise<SpendResult>;

  /** Return one unit to the bucket it was taken from (opt-in refund policy) */
  refund(accountId: string, source: CreditSource): Promise<Account>;
}
