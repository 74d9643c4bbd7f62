/**
 * /credits Command Handler
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { getChatIdentity, UNIDENTIFIED_USER_REPLY } from '../context.js';
import { creditsMessage, noAccountMessage } from '../messages.js';
import { logger } from '../../utils/logger.js';

export async function handleCreditsCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  logger.info({ userId: identity.telegramUserId, command: 'credits' }, 'Telegram /credits command received');

  try {
    const account = await deps.accounts.findByTelegramId(identity.telegramUserId);
    if (!account) {
      await ctx.reply(noAccountMessage());
      return;
    }
    await ctx.reply(creditsMessage(account), { parse_mode: 'Markdown' });
  } catch (error) {
    logger.error({ err: error, userId: identity.telegramUserId }, 'Error in /credits command');
    await ctx.reply('❌ Could not load your balance. Please try again later.');
  }
}

export function registerCreditsCommand(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.command('credits', (ctx) => handleCreditsCommand(ctx, deps));
}
