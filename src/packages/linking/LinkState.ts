/**
 * LinkState Enum
 *
 * States of the account-linking conversation in one chat.
 *
 * State flow:
 *   IDLE → AWAITING_EMAIL → AWAITING_CODE → LINKED
 *
 * CANCELLED is reachable from both waiting states. LINKED and CANCELLED are
 * terminal: the session is dropped and the chat behaves as IDLE again.
 *
 * @module packages/linking/LinkState
 */

export enum LinkState {
  /** No conversation in progress (also what an absent or evicted session means) */
  IDLE = 'IDLE',

  /** /link received; next text is read as an email address */
  AWAITING_EMAIL = 'AWAITING_EMAIL',

  /** Passcode sent to the candidate email; next text is read as the code */
  AWAITING_CODE = 'AWAITING_CODE',

  LINKED = 'LINKED',

  CANCELLED = 'CANCELLED',
}

/**
 * Valid state transitions map.
 *
 * Restarting with /link mid-flow replaces the session instead of transitioning.
 */
export const VALID_TRANSITIONS: Record<LinkState, LinkState[]> = {
  [LinkState.IDLE]: [LinkState.AWAITING_EMAIL],
  [LinkState.AWAITING_EMAIL]: [LinkState.AWAITING_CODE, LinkState.CANCELLED],
  [LinkState.AWAITING_CODE]: [LinkState.LINKED, LinkState.CANCELLED],
  [LinkState.LINKED]: [], // Terminal state
  [LinkState.CANCELLED]: [], // Terminal state
};

export const STATE_DISPLAY_NAMES: Record<LinkState, string> = {
  [LinkState.IDLE]: 'Not linking',
  [LinkState.AWAITING_EMAIL]: 'Waiting for email',
  [LinkState.AWAITING_CODE]: 'Waiting for code',
  [LinkState.LINKED]: 'Linked',
  [LinkState.CANCELLED]: 'Cancelled',
};

export function isValidTransition(from: LinkState, to: LinkState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: LinkState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}
