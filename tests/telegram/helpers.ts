/**
 * Shared fixtures for Telegram handler tests
 */

import { vi, type Mock } from 'vitest';
import type Database from 'better-sqlite3';
import type { BotContext, BotDeps, BotSettings } from '../../src/telegram/bot.js';
import { SqliteAccountStore } from '../../src/packages/adapters/storage/SqliteAccountStore.js';
import { SqliteOtpRegistry } from '../../src/packages/adapters/storage/SqliteOtpRegistry.js';
import { CreditReconcilerAdapter } from '../../src/packages/adapters/billing/CreditReconcilerAdapter.js';
import { VerificationService } from '../../src/services/VerificationService.js';
import { LinkSessionStore, LinkingEngine } from '../../src/packages/linking/index.js';

export const TEST_CODE = '482913';

export const testSettings: BotSettings = {
  priceLabel: '₹12',
  checkoutUrl: 'https://pay.example.com/checkout',
  appUrl: 'https://quiz.example.com',
  supportContact: '@support',
  otpTtlMinutes: 10,
  topicMinLength: 5,
  topicMaxLength: 500,
  signupFreeCredits: 1,
  refundOnGenerationFailure: false,
};

export interface TestDeps extends BotDeps {
  accounts: SqliteAccountStore;
  reconciler: CreditReconcilerAdapter;
  generate: Mock<(topic: string) => Promise<string>>;
  sendPasscode: Mock<(email: string, code: string) => Promise<boolean>>;
}

export function createTestDeps(db: Database.Database, settings: Partial<BotSettings> = {}): TestDeps {
  const accounts = new SqliteAccountStore(db);
  const reconciler = new CreditReconcilerAdapter(db);
  const sendPasscode = vi.fn<(email: string, code: string) => Promise<boolean>>().mockResolvedValue(true);
  const generate = vi.fn<(topic: string) => Promise<string>>();
  const verification = new VerificationService(new SqliteOtpRegistry(db), { sendPasscode }, {
    generateCode: () => TEST_CODE,
  });
  const linking = new LinkingEngine({ accounts, reconciler, verification, sessions: new LinkSessionStore() });

  return {
    accounts,
    reconciler,
    linking,
    generator: { generate },
    settings: { ...testSettings, ...settings },
    generate,
    sendPasscode,
  };
}

/**
 * Create a mock grammy context
 */
export function createMockContext(options: { userId?: number; username?: string; text?: string } = {}) {
  const { userId = 123456789, username = 'testuser', text = '/test' } = options;

  return {
    from: {
      id: userId,
      username,
      first_name: 'Test',
      is_bot: false,
    },
    chat: {
      id: userId,
      type: 'private',
    },
    message: {
      message_id: 1,
      text,
      date: Math.floor(Date.now() / 1000),
    },
    reply: vi.fn().mockResolvedValue({ message_id: 77 }),
    replyWithDocument: vi.fn().mockResolvedValue({ message_id: 78 }),
    answerCallbackQuery: vi.fn().mockResolvedValue(true),
    api: {
      deleteMessage: vi.fn().mockResolvedValue(true),
    },
  };
}

export type MockContext = ReturnType<typeof createMockContext>;

/**
 * Handlers only touch the members the mock provides
 */
export function asBotContext(ctx: MockContext): BotContext {
  return ctx as unknown as BotContext;
}

/** Reply texts in call order */
export function replyTexts(ctx: MockContext): string[] {
  return ctx.reply.mock.calls.map((call) => String(call[0]));
}
