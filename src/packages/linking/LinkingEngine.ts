/**
 * LinkingEngine - Account-linking conversation
 *
 * Drives one chat through IDLE → AWAITING_EMAIL → AWAITING_CODE → LINKED,
 * calling the verification service and the credit reconciler at each step.
 * Every step returns a LinkStepResult; the Telegram layer decides the wording.
 *
 * @module packages/linking/LinkingEngine
 */

import type { Account, IAccountStore } from '../core/ports/IAccountStore.js';
import { isLinked } from '../core/ports/IAccountStore.js';
import type { ICreditReconciler } from '../core/ports/ICreditReconciler.js';
import type { OtpConsumeResult } from '../core/ports/IOtpRegistry.js';
import type { VerificationService } from '../../services/VerificationService.js';
import { LinkState } from './LinkState.js';
import type { LinkSessionStore } from './LinkSessionStore.js';
import { parseEmail, maskEmail } from '../../utils/email.js';
import {
  ConservationViolationError,
  LinkIntegrityError,
  logError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const CODE_PATTERN = /^[0-9]{6}$/;

// =============================================================================
// Results
// =============================================================================

export type LinkStepResult =
  | { kind: 'already_linked'; email: string }
  | { kind: 'awaiting_email' }
  | { kind: 'invalid_email' }
  | { kind: 'account_not_found'; email: string }
  | { kind: 'email_taken' }
  | { kind: 'code_send_failed' }
  | { kind: 'code_sent'; email: string }
  | { kind: 'invalid_code' }
  | { kind: 'verification_unavailable' }
  | { kind: 'verification_failed'; reason: Exclude<OtpConsumeResult, 'accepted'> }
  | { kind: 'linked'; email: string; freeCredits: number; paidCredits: number; merged: boolean }
  | { kind: 'link_integrity_error' }
  | { kind: 'link_failed' }
  | { kind: 'cancelled' }
  | { kind: 'nothing_to_cancel' };

export type LinkStepKind = LinkStepResult['kind'];

export interface LinkingEngineDeps {
  accounts: IAccountStore;
  reconciler: ICreditReconciler;
  verification: VerificationService;
  sessions: LinkSessionStore;
}

// =============================================================================
// LinkingEngine
// =============================================================================

export class LinkingEngine {
  private readonly accounts: IAccountStore;
  private readonly reconciler: ICreditReconciler;
  private readonly verification: VerificationService;
  private readonly sessions: LinkSessionStore;

  constructor(deps: LinkingEngineDeps) {
    this.accounts = deps.accounts;
    this.reconciler = deps.reconciler;
    this.verification = deps.verification;
    this.sessions = deps.sessions;
  }

  /**
   * Whether free text from this chat belongs to the link conversation
   */
  hasOpenSession(key: string): boolean {
    return this.sessions.get(key) !== null;
  }

  stateOf(key: string): LinkState {
    return this.sessions.stateOf(key);
  }

  /**
   * /link: start (or restart) the conversation unless already linked.
   * Store failures propagate to the caller.
   */
  async begin(key: string, chatIdentity: string): Promise<LinkStepResult> {
    const account = await this.accounts.findByTelegramId(chatIdentity);
    if (account && isLinked(account) && account.email !== null) {
      this.sessions.delete(key);
      return { kind: 'already_linked', email: account.email };
    }

    this.sessions.start(key, chatIdentity);
    logger.info({ sessionKey: key, chatIdentity }, 'Link conversation started');
    return { kind: 'awaiting_email' };
  }

  /**
   * Feed one text message into the open conversation.
   * Returns null when there is no open session for the key.
   */
  async handleText(
    key: string,
    chatIdentity: string,
    text: string,
    username?: string | null
  ): Promise<LinkStepResult | null> {
    const session = this.sessions.get(key);
    if (!session) {
      return null;
    }

    switch (session.state) {
      case LinkState.AWAITING_EMAIL:
        return this.handleEmail(key, chatIdentity, text);
      case LinkState.AWAITING_CODE:
        if (session.candidateEmail === null) {
          this.sessions.transition(key, LinkState.CANCELLED);
          return { kind: 'link_failed' };
        }
        return this.handleCode(key, chatIdentity, session.candidateEmail, text, username ?? null);
      default:
        return null;
    }
  }

  /**
   * /cancel: abandon the conversation without side effects
   */
  cancel(key: string): LinkStepResult {
    const session = this.sessions.get(key);
    if (!session) {
      return { kind: 'nothing_to_cancel' };
    }
    this.sessions.transition(key, LinkState.CANCELLED);
    logger.info({ sessionKey: key, from: session.state }, 'Link conversation cancelled');
    return { kind: 'cancelled' };
  }

  // ---------------------------------------------------------------------------
  // Steps
  // ---------------------------------------------------------------------------

  private async handleEmail(key: string, chatIdentity: string, text: string): Promise<LinkStepResult> {
    const email = parseEmail(text);
    if (email === null) {
      return { kind: 'invalid_email' };
    }

    let target: Account | null;
    try {
      target = await this.accounts.findByEmail(email);
    } catch (error) {
      logError(error, { operation: 'linkLookup', sessionKey: key });
      return { kind: 'code_send_failed' };
    }

    if (!target) {
      return { kind: 'account_not_found', email };
    }

    if (target.telegramUserId !== null && target.telegramUserId !== chatIdentity) {
      this.sessions.transition(key, LinkState.CANCELLED);
      logger.warn({ sessionKey: key, email: maskEmail(email) }, 'Email already linked to another chat');
      return { kind: 'email_taken' };
    }

    const sent = await this.verification.issueCode(email);
    if (!sent) {
      return { kind: 'code_send_failed' };
    }

    this.sessions.transition(key, LinkState.AWAITING_CODE, { candidateEmail: email });
    return { kind: 'code_sent', email };
  }

  private async handleCode(
    key: string,
    chatIdentity: string,
    email: string,
    text: string,
    username: string | null
  ): Promise<LinkStepResult> {
    const code = text.trim();
    if (!CODE_PATTERN.test(code)) {
      return { kind: 'invalid_code' };
    }

    let outcome: OtpConsumeResult;
    try {
      outcome = await this.verification.verifyCode(email, code);
    } catch (error) {
      // The check-and-mark rolled back, so the same code can be sent again
      logError(error, { operation: 'verifyPasscode', sessionKey: key });
      return { kind: 'verification_unavailable' };
    }

    if (outcome !== 'accepted') {
      this.sessions.transition(key, LinkState.CANCELLED);
      return { kind: 'verification_failed', reason: outcome };
    }

    try {
      const merged = await this.reconciler.merge({
        telegramUserId: chatIdentity,
        telegramUsername: username,
        email,
      });
      this.sessions.transition(key, LinkState.LINKED);
      return {
        kind: 'linked',
        email,
        freeCredits: merged.account.freeCredits,
        paidCredits: merged.account.paidCredits,
        merged: merged.outcome === 'merged',
      };
    } catch (error) {
      logError(error, { operation: 'mergeAccounts', sessionKey: key });
      this.sessions.transition(key, LinkState.CANCELLED);
      if (error instanceof LinkIntegrityError || error instanceof ConservationViolationError) {
        return { kind: 'link_integrity_error' };
      }
      return { kind: 'link_failed' };
    }
  }
}
