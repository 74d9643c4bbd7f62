/**
 * Identity helpers for incoming updates
 */

import type { BotContext } from './bot.js';
import { linkSessionKey } from '../packages/linking/index.js';

export interface ChatIdentity {
  /** Telegram user id as stored in accounts.telegram_user_id */
  telegramUserId: string;
  username: string | null;
  /** Link session key for this chat/user pair */
  sessionKey: string;
}

/**
 * Resolve who sent the update; null for updates without a user or chat
 */
export function getChatIdentity(ctx: BotContext): ChatIdentity | null {
  const from = ctx.from;
  const chatId = ctx.chat?.id;
  if (!from || chatId === undefined) {
    return null;
  }
  return {
    telegramUserId: from.id.toString(),
    username: from.username ?? null,
    sessionKey: linkSessionKey(chatId, from.id),
  };
}

export const UNIDENTIFIED_USER_REPLY = 'Could not identify your Telegram account. Please try again.';
