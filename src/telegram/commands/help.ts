/**
 * /help Command Handler
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { helpMessage } from '../messages.js';
import { logger } from '../../utils/logger.js';

export async function handleHelpCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  logger.info({ userId: ctx.from?.id, command: 'help' }, 'Telegram /help command received');
  await ctx.reply(helpMessage(deps.settings), { parse_mode: 'Markdown' });
}

export function registerHelpCommand(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.command('help', (ctx) => handleHelpCommand(ctx, deps));
}
