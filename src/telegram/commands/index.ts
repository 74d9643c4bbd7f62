/**
 * Telegram Command Handlers Index
 *
 * Registers all command handlers, callback queries and the free-text router.
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { registerStartCommand } from './start.js';
import { registerHelpCommand } from './help.js';
import { registerCreditsCommand } from './credits.js';
import { registerBuyCommand } from './buy.js';
import { registerPaidCommand } from './paid.js';
import { registerLinkCommands } from './link.js';
import { registerTextRouter } from '../router.js';
import { logger } from '../../utils/logger.js';

export const BOT_COMMANDS = [
  { command: 'start', description: 'Create your account or see your balance' },
  { command: 'credits', description: 'Show your credit balance' },
  { command: 'buy', description: 'Buy more credits' },
  { command: 'paid', description: 'Refresh your balance after paying' },
  { command: 'link', description: 'Link this chat to your web account' },
  { command: 'cancel', description: 'Stop linking' },
  { command: 'help', description: 'How the bot works' },
] as const;

/**
 * Register all handlers on the bot (commands first, free text last)
 */
export function registerAllCommands(bot: Bot<BotContext>, deps: BotDeps): void {
  registerStartCommand(bot, deps);
  registerHelpCommand(bot, deps);
  registerCreditsCommand(bot, deps);
  registerBuyCommand(bot, deps);
  registerPaidCommand(bot, deps);
  registerLinkCommands(bot, deps);

  registerTextRouter(bot, deps);
}

/**
 * Publish the command menu; the bot works without it
 */
export async function publishCommandMenu(bot: Bot<BotContext>): Promise<void> {
  try {
    await bot.api.setMyCommands(BOT_COMMANDS.map((c) => ({ command: c.command, description: c.description })));
  } catch (error) {
    logger.warn({ err: error }, 'Failed to set bot commands');
  }
}
