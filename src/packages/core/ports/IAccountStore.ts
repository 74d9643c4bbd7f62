/**
 * IAccountStore - Account Store Port
 *
 * Durable table of accounts shared by the chat surface and the web surface.
 * Reads here are plain lookups; every mutation that touches balances of more
 * than one row, or reads-then-writes a balance, lives in ICreditReconciler.
 *
 * @module packages/core/ports/IAccountStore
 */

// =============================================================================
// Types
// =============================================================================

export interface Account {
  /** Stable internal key, never reused */
  id: string;
  /** Chat-surface identity (Telegram user id) */
  telegramUserId: string | null;
  telegramUsername: string | null;
  /** Lower-cased email; null for placeholder accounts */
  email: string | null;
  /** Created from chat and not yet merged into a web account */
  isPlaceholder: boolean;
  emailVerified: boolean;
  freeCredits: number;
  paidCredits: number;
  totalQueries: number;
  lastQueryAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreatePlaceholderParams {
  telegramUserId: string;
  telegramUsername?: string | null;
  freeCredits: number;
}

export interface CreateWebAccountParams {
  email: string;
  freeCredits?: number;
  paidCredits?: number;
}

export interface EnsureAccountResult {
  account: Account;
  /** true when this call inserted the row */
  created: boolean;
}

// =============================================================================
// Port
// =============================================================================

export interface IAccountStore {
  findById(id: string): Promise<Account | null>;
  findByTelegramId(telegramUserId: string): Promise<Account | null>;
  /** Looks up non-placeholder accounts only; the email is normalized first */
  findByEmail(email: string): Promise<Account | null>;

  /**
   * Return the account bound to the chat identity, creating a placeholder
   * with the sign-up grant if there is none. Safe under concurrent calls.
   */
  ensurePlaceholder(params: CreatePlaceholderParams): Promise<EnsureAccountResult>;

  /** Insert a web-surface account (sign-up happens outside the bot) */
  createWebAccount(params: CreateWebAccountParams): Promise<Account>;

  /** Out-of-band top-up written by the payment side */
  addPaidCredits(accountId: string, amount: number): Promise<Account>;
}

// =============================================================================
// Helpers
// =============================================================================

export function totalCredits(account: Pick<Account, 'freeCredits' | 'paidCredits'>): number {
  return account.freeCredits + account.paidCredits;
}

/**
 * Linked = a verified, real-email account that the chat identity is bound to.
 * Never inferred from the shape of the email.
 */
export function isLinked(account: Account): boolean {
  return !account.isPlaceholder && account.emailVerified && account.telegramUserId !== null;
}
