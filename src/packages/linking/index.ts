/**
 * Account linking
 *
 * @module packages/linking
 */

export { LinkState, VALID_TRANSITIONS, STATE_DISPLAY_NAMES, isValidTransition, isTerminalState } from './LinkState.js';
export type { LinkSession } from './LinkSession.js';
export { linkSessionKey, DEFAULT_LINK_SESSION_TTL_SECONDS } from './LinkSession.js';
export { LinkSessionStore, SessionStoreError, type LinkSessionStoreConfig } from './LinkSessionStore.js';
export { LinkingEngine, type LinkStepResult, type LinkStepKind, type LinkingEngineDeps } from './LinkingEngine.js';
