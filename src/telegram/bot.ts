/**
 * Telegram Bot Module
 *
 * Builds the grammy bot, wires handlers and manages its lifecycle.
 * Supports both webhook mode (production) and polling mode (development).
 */

import { Bot, type Context, type MiddlewareFn, webhookCallback } from 'grammy';
import type { UserFromGetMe } from 'grammy/types';
import { run, sequentialize, type RunnerHandle } from '@grammyjs/runner';
import type { Request, Response } from 'express';
import type { Config } from '../config.js';
import type { IAccountStore } from '../packages/core/ports/IAccountStore.js';
import type { ICreditReconciler } from '../packages/core/ports/ICreditReconciler.js';
import type { IQuestionGenerator } from '../packages/core/ports/IQuestionGenerator.js';
import type { LinkingEngine } from '../packages/linking/index.js';
import { linkSessionKey } from '../packages/linking/index.js';
import type { MessageSettings } from './messages.js';
import { logger } from '../utils/logger.js';

// =============================================================================
// Type Definitions
// =============================================================================

export type BotContext = Context;

export interface BotSettings extends MessageSettings {
  checkoutUrl: string;
  signupFreeCredits: number;
  refundOnGenerationFailure: boolean;
}

/**
 * Everything the handlers need
 */
export interface BotDeps {
  accounts: IAccountStore;
  reconciler: ICreditReconciler;
  linking: LinkingEngine;
  generator: IQuestionGenerator;
  settings: BotSettings;
}

export function botSettingsFromConfig(cfg: Config): BotSettings {
  return {
    priceLabel: cfg.payment.priceLabel,
    checkoutUrl: cfg.payment.checkoutUrl,
    appUrl: cfg.web.appUrl,
    supportContact: cfg.web.supportContact,
    otpTtlMinutes: cfg.otp.ttlMinutes,
    topicMinLength: cfg.topic.minLength,
    topicMaxLength: cfg.topic.maxLength,
    signupFreeCredits: cfg.credits.signupFreeCredits,
    refundOnGenerationFailure: cfg.credits.refundOnGenerationFailure,
  };
}

/**
 * Key that orders updates of one chat/user pair; matches the link session key
 */
export function getUpdateKey(ctx: BotContext): string | undefined {
  const chatId = ctx.chat?.id;
  const userId = ctx.from?.id;
  if (chatId === undefined || userId === undefined) {
    return undefined;
  }
  return linkSessionKey(chatId, userId);
}

/**
 * Drop updates whose update_id was already seen.
 * Telegram redelivers an update when the webhook does not answer in time; a
 * redelivered topic request must not spend a second credit.
 */
export function dropRedeliveredUpdates(capacity: number = 1000): MiddlewareFn<BotContext> {
  const seen = new Set<number>();
  return async (ctx, next) => {
    const updateId = ctx.update.update_id;
    if (seen.has(updateId)) {
      logger.info({ updateId, chatId: ctx.chat?.id }, 'Dropping redelivered update');
      return;
    }
    seen.add(updateId);
    if (seen.size > capacity) {
      const oldest = seen.values().next().value;
      if (oldest !== undefined) {
        seen.delete(oldest);
      }
    }
    await next();
  };
}

// =============================================================================
// Bot Instance
// =============================================================================

let runner: RunnerHandle | null = null;

export interface CreateBotOptions {
  /** Skips the getMe call on init (used by tests) */
  botInfo?: UserFromGetMe;
}

/**
 * Create and configure the Telegram bot instance
 */
export function createBot(
  token: string,
  deps: BotDeps,
  register: (bot: Bot<BotContext>, deps: BotDeps) => void,
  options: CreateBotOptions = {}
): Bot<BotContext> {
  const bot = new Bot<BotContext>(token, options.botInfo ? { botInfo: options.botInfo } : {});

  bot.use(dropRedeliveredUpdates());
  // Updates of the same chat are handled in order; different chats run concurrently
  bot.use(sequentialize(getUpdateKey));

  register(bot, deps);

  // Error handler (last resort; handlers reply on their own failures)
  bot.catch((err) => {
    const ctx = err.ctx;
    logger.error(
      {
        err: err.error,
        updateId: ctx.update.update_id,
        chatId: ctx.chat?.id,
        userId: ctx.from?.id,
      },
      'Telegram bot error'
    );

    ctx.reply('Something went wrong. Please try again later.').catch((replyError: unknown) => {
      logger.warn({ err: replyError, chatId: ctx.chat?.id }, 'Failed to send error reply');
    });
  });

  return bot;
}

// =============================================================================
// Bot Lifecycle
// =============================================================================

/**
 * Start receiving updates
 *
 * polling: concurrent long polling through @grammyjs/runner
 * webhook: registers the webhook URL; updates arrive via the API server
 */
export async function startTelegramBot(bot: Bot<BotContext>, cfg: Config): Promise<void> {
  if (runner?.isRunning()) {
    logger.warn('Telegram bot is already running');
    return;
  }

  await bot.init();

  if (cfg.telegram.mode === 'webhook') {
    const webhookUrl = cfg.telegram.webhookUrl;
    if (!webhookUrl) {
      throw new Error('TELEGRAM_WEBHOOK_URL is required in webhook mode');
    }
    await bot.api.setWebhook(webhookUrl, {
      secret_token: cfg.telegram.webhookSecret,
      allowed_updates: ['message', 'callback_query'],
    });
    logger.info({ webhookUrl, username: bot.botInfo.username }, 'Telegram webhook configured');
    return;
  }

  // A leftover webhook blocks getUpdates
  await bot.api.deleteWebhook();
  runner = run(bot);
  logger.info({ username: bot.botInfo.username, id: bot.botInfo.id }, 'Telegram bot started in polling mode');
}

/**
 * Stop the polling runner, if any
 */
export async function stopTelegramBot(): Promise<void> {
  if (!runner) {
    return;
  }

  logger.info('Stopping Telegram bot...');
  try {
    if (runner.isRunning()) {
      await runner.stop();
    }
    logger.info('Telegram bot stopped');
  } catch (error) {
    logger.error({ err: error }, 'Error stopping Telegram bot');
  }
  runner = null;
}

// =============================================================================
// Webhook Handler
// =============================================================================

/** Telegram is answered after this long; the update keeps being processed */
export const WEBHOOK_ACK_TIMEOUT_MS = 5000;

export interface WebhookHandlerOptions {
  ackTimeoutMs?: number;
}

/**
 * Express middleware for Telegram webhook requests
 *
 * Generation outlasts Telegram's patience, so a slow update is acknowledged
 * with 200 once the ack timeout passes instead of failing the request.
 *
 * Usage:
 *   app.post('/telegram/webhook', createTelegramWebhookHandler(bot, secret));
 */
export function createTelegramWebhookHandler(
  bot: Bot<BotContext>,
  secretToken?: string,
  options: WebhookHandlerOptions = {}
): (req: Request, res: Response) => Promise<void> {
  const handler = webhookCallback(bot, 'express', {
    secretToken,
    onTimeout: 'return',
    timeoutMilliseconds: options.ackTimeoutMs ?? WEBHOOK_ACK_TIMEOUT_MS,
  });
  return async (req: Request, res: Response): Promise<void> => {
    await handler(req, res);
  };
}
