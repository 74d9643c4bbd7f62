import { describe, it, expect, beforeEach } from 'vitest';
import { LinkSessionStore, LinkState, SessionStoreError, linkSessionKey } from '../../../src/packages/linking/index.js';

describe('LinkSessionStore', () => {
  let clock: Date;
  let store: LinkSessionStore;
  const key = linkSessionKey(42, 1001);

  const advance = (seconds: number) => {
    clock = new Date(clock.getTime() + seconds * 1000);
  };

  beforeEach(() => {
    clock = new Date('2026-03-01T10:00:00Z');
    store = new LinkSessionStore({ ttl: 900, now: () => clock });
  });

  it('builds keys from chat and user ids', () => {
    expect(key).toBe('42:1001');
  });

  it('reports IDLE for unknown keys', () => {
    expect(store.get(key)).toBeNull();
    expect(store.stateOf(key)).toBe(LinkState.IDLE);
  });

  it('starts in AWAITING_EMAIL', () => {
    const session = store.start(key, '1001');
    expect(session).toMatchObject({ key, state: LinkState.AWAITING_EMAIL, chatIdentity: '1001', candidateEmail: null });
    expect(session.expiresAt).toEqual(new Date('2026-03-01T10:15:00Z'));
  });

  it('records the candidate email on the way to AWAITING_CODE', () => {
    store.start(key, '1001');
    const session = store.transition(key, LinkState.AWAITING_CODE, { candidateEmail: 'bob@example.com' });
    expect(session.state).toBe(LinkState.AWAITING_CODE);
    expect(store.get(key)?.candidateEmail).toBe('bob@example.com');
  });

  it('drops the session on a terminal state', () => {
    store.start(key, '1001');
    store.transition(key, LinkState.CANCELLED);
    expect(store.get(key)).toBeNull();
    expect(store.size).toBe(0);
  });

  it('rejects invalid transitions', () => {
    store.start(key, '1001');
    expect(() => store.transition(key, LinkState.LINKED)).toThrow(SessionStoreError);
    expect(() => store.transition('other', LinkState.CANCELLED)).toThrow(/Session not found/);
  });

  it('restarts an open session', () => {
    store.start(key, '1001');
    store.transition(key, LinkState.AWAITING_CODE, { candidateEmail: 'bob@example.com' });
    const restarted = store.start(key, '1001');
    expect(restarted.state).toBe(LinkState.AWAITING_EMAIL);
    expect(restarted.candidateEmail).toBeNull();
  });

  it('expires idle sessions lazily', () => {
    store.start(key, '1001');
    advance(899);
    expect(store.stateOf(key)).toBe(LinkState.AWAITING_EMAIL);
    advance(1);
    expect(store.get(key)).toBeNull();
  });

  it('extends the lifetime on each transition', () => {
    store.start(key, '1001');
    advance(600);
    store.transition(key, LinkState.AWAITING_CODE, { candidateEmail: 'bob@example.com' });
    advance(600);
    expect(store.stateOf(key)).toBe(LinkState.AWAITING_CODE);
  });

  it('sweeps expired sessions', () => {
    store.start('1:1', '1');
    advance(500);
    store.start('2:2', '2');
    advance(500);
    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.get('2:2')).not.toBeNull();
  });
});
