/**
 * Link session model
 *
 * @module packages/linking/LinkSession
 */

import type { LinkState } from './LinkState.js';

/** Default idle lifetime of a link session (15 minutes) */
export const DEFAULT_LINK_SESSION_TTL_SECONDS = 15 * 60;

export interface LinkSession {
  /** `${chatId}:${userId}` */
  key: string;
  state: LinkState;
  /** Chat-surface identity the link will bind */
  chatIdentity: string;
  /** Set on entering AWAITING_CODE */
  candidateEmail: string | null;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

/**
 * Build the session key for a chat/user pair
 */
export function linkSessionKey(chatId: number | string, userId: number | string): string {
  return `${chatId}:${userId}`;
}
