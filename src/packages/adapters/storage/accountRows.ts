/**
 * Row shape of the accounts table and its mapping to the domain Account.
 *
 * @module packages/adapters/storage/accountRows
 */

import type { Account } from '../../core/ports/IAccountStore.js';
import { fromUnixSeconds } from '../../../db/timestamps.js';

export interface AccountRow {
  id: string;
  telegram_user_id: string | null;
  telegram_username: string | null;
  email: string | null;
  is_placeholder: number;
  email_verified: number;
  free_credits: number;
  paid_credits: number;
  total_queries: number;
  last_query_at: number | null;
  created_at: number;
  updated_at: number;
}

export const ACCOUNT_COLUMNS = `
  id, telegram_user_id, telegram_username, email, is_placeholder, email_verified,
  free_credits, paid_credits, total_queries, last_query_at, created_at, updated_at
`;

export function rowToAccount(row: AccountRow): Account {
  return {
    id: row.id,
    telegramUserId: row.telegram_user_id,
    telegramUsername: row.telegram_username,
    email: row.email,
    isPlaceholder: row.is_placeholder === 1,
    emailVerified: row.email_verified === 1,
    freeCredits: row.free_credits,
    paidCredits: row.paid_credits,
    totalQueries: row.total_queries,
    lastQueryAt: row.last_query_at === null ? null : fromUnixSeconds(row.last_query_at),
    createdAt: fromUnixSeconds(row.created_at),
    updatedAt: fromUnixSeconds(row.updated_at),
  };
}
