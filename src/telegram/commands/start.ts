/**
 * /start Command Handler
 *
 * Creates the chat's account on first contact (with the sign-up grant) and
 * greets returning users with their balance and link status.
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { getChatIdentity, UNIDENTIFIED_USER_REPLY } from '../context.js';
import { welcomeNewMessage, welcomeBackMessage } from '../messages.js';
import { isLinked } from '../../packages/core/ports/IAccountStore.js';
import { logger } from '../../utils/logger.js';

export async function handleStartCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  logger.info({ userId: identity.telegramUserId, command: 'start' }, 'Telegram /start command received');

  try {
    const { account, created } = await deps.accounts.ensurePlaceholder({
      telegramUserId: identity.telegramUserId,
      telegramUsername: identity.username,
      freeCredits: deps.settings.signupFreeCredits,
    });

    if (created) {
      await ctx.reply(welcomeNewMessage(account, deps.settings), {
        parse_mode: 'Markdown',
        reply_markup: {
          inline_keyboard: [[{ text: '🔗 Link web account', callback_data: 'start_link' }]],
        },
      });
      return;
    }

    await ctx.reply(welcomeBackMessage(account), {
      parse_mode: 'Markdown',
      ...(isLinked(account)
        ? {}
        : {
            reply_markup: {
              inline_keyboard: [[{ text: '🔗 Link web account', callback_data: 'start_link' }]],
            },
          }),
    });
  } catch (error) {
    logger.error({ err: error, userId: identity.telegramUserId }, 'Error in /start command');
    await ctx.reply('❌ Something went wrong while setting up your account. Please try again later.');
  }
}

export function registerStartCommand(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.command('start', (ctx) => handleStartCommand(ctx, deps));
}
