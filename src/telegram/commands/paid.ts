/**
 * /paid Command Handler (and the "I've paid" button)
 *
 * Top-ups are written to the shared store by the payment side; this only
 * re-reads the balance.
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { getChatIdentity, UNIDENTIFIED_USER_REPLY } from '../context.js';
import { paidBalanceMessage, paidNotLinkedMessage } from '../messages.js';
import { isLinked } from '../../packages/core/ports/IAccountStore.js';
import { logger } from '../../utils/logger.js';

export async function handlePaidCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  logger.info({ userId: identity.telegramUserId, command: 'paid' }, 'Telegram /paid command received');

  try {
    const account = await deps.accounts.findByTelegramId(identity.telegramUserId);
    if (!account || !isLinked(account)) {
      await ctx.reply(paidNotLinkedMessage(), {
        reply_markup: {
          inline_keyboard: [[{ text: '🔗 Link account', callback_data: 'start_link' }]],
        },
      });
      return;
    }
    await ctx.reply(paidBalanceMessage(account), { parse_mode: 'Markdown' });
  } catch (error) {
    logger.error({ err: error, userId: identity.telegramUserId }, 'Error in /paid command');
    await ctx.reply('❌ Could not refresh your balance. Please try again later.');
  }
}

export function registerPaidCommand(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.command('paid', (ctx) => handlePaidCommand(ctx, deps));

  bot.callbackQuery('check_payment', async (ctx) => {
    await ctx.answerCallbackQuery();
    await handlePaidCommand(ctx, deps);
  });
}
