/**
 * LinkSessionStore - In-memory link session table
 *
 * Sessions live only as long as the process and only while active: terminal
 * sessions are removed immediately and idle ones expire after the TTL, either
 * lazily on read or through sweep().
 *
 * @module packages/linking/LinkSessionStore
 */

import { LinkState, isValidTransition, isTerminalState } from './LinkState.js';
import { DEFAULT_LINK_SESSION_TTL_SECONDS, type LinkSession } from './LinkSession.js';
import { logger } from '../../utils/logger.js';

export interface LinkSessionStoreConfig {
  /** Session TTL in seconds */
  ttl?: number;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class SessionStoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly sessionKey?: string
  ) {
    super(message);
    this.name = 'SessionStoreError';
  }
}

export class LinkSessionStore {
  private readonly sessions = new Map<string, LinkSession>();
  private readonly ttl: number;
  private readonly now: () => Date;

  constructor(config: LinkSessionStoreConfig = {}) {
    this.ttl = config.ttl ?? DEFAULT_LINK_SESSION_TTL_SECONDS;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Get the open session for a key, or null (IDLE)
   */
  get(key: string): LinkSession | null {
    const session = this.sessions.get(key);
    if (!session) {
      return null;
    }
    if (session.expiresAt.getTime() <= this.now().getTime()) {
      this.sessions.delete(key);
      logger.debug({ sessionKey: key, state: session.state }, 'Link session expired');
      return null;
    }
    return session;
  }

  /**
   * Current state for a key; IDLE when there is no open session
   */
  stateOf(key: string): LinkState {
    return this.get(key)?.state ?? LinkState.IDLE;
  }

  /**
   * Open a fresh session in AWAITING_EMAIL, replacing any open one
   */
  start(key: string, chatIdentity: string): LinkSession {
    const now = this.now();
    const session: LinkSession = {
      key,
      state: LinkState.AWAITING_EMAIL,
      chatIdentity,
      candidateEmail: null,
      createdAt: now,
      updatedAt: now,
      expiresAt: new Date(now.getTime() + this.ttl * 1000),
    };
    this.sessions.set(key, session);
    return session;
  }

  /**
   * Move an open session to a new state. Terminal states close the session.
   *
   * @throws SessionStoreError if there is no open session or the transition is invalid
   */
  transition(key: string, to: LinkState, data: { candidateEmail?: string } = {}): LinkSession {
    const session = this.get(key);
    if (!session) {
      throw new SessionStoreError(`Session not found: ${key}`, 'SESSION_NOT_FOUND', key);
    }
    if (!isValidTransition(session.state, to)) {
      throw new SessionStoreError(
        `Invalid state transition: ${session.state} -> ${to}`,
        'INVALID_TRANSITION',
        key
      );
    }

    const now = this.now();
    const updated: LinkSession = {
      ...session,
      state: to,
      candidateEmail: data.candidateEmail ?? session.candidateEmail,
      updatedAt: now,
      expiresAt: new Date(now.getTime() + this.ttl * 1000),
    };

    if (isTerminalState(to)) {
      this.sessions.delete(key);
    } else {
      this.sessions.set(key, updated);
    }
    return updated;
  }

  delete(key: string): boolean {
    return this.sessions.delete(key);
  }

  /**
   * Remove every expired session; returns how many were removed
   */
  sweep(): number {
    const now = this.now().getTime();
    let removed = 0;
    for (const [key, session] of this.sessions) {
      if (session.expiresAt.getTime() <= now) {
        this.sessions.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug({ removed }, 'Swept expired link sessions');
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
