import { describe, it, expect, vi } from 'vitest';
import { dropRedeliveredUpdates, getUpdateKey, type BotContext } from '../../src/telegram/bot.js';

function updateContext(updateId: number): BotContext {
  return { update: { update_id: updateId }, chat: { id: 9, type: 'private' }, from: { id: 9 } } as unknown as BotContext;
}

describe('dropRedeliveredUpdates', () => {
  it('passes each update id through once', async () => {
    const middleware = dropRedeliveredUpdates();
    const next = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);

    await middleware(updateContext(1), next);
    await middleware(updateContext(1), next);
    await middleware(updateContext(2), next);

    expect(next).toHaveBeenCalledTimes(2);
  });

  it('forgets the oldest ids beyond its capacity', async () => {
    const middleware = dropRedeliveredUpdates(2);
    const next = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);

    for (const id of [1, 2, 3, 1]) {
      await middleware(updateContext(id), next);
    }

    expect(next).toHaveBeenCalledTimes(4);
  });
});

describe('getUpdateKey', () => {
  it('keys updates by chat and user', () => {
    expect(getUpdateKey(updateContext(1))).toBe('9:9');
  });
});
