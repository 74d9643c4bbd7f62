/**
 * /buy Command Handler
 *
 * Payments are taken by the external checkout and credited to a web account
 * by email, so unlinked users are pointed at /link before paying.
 */

import type { Bot } from 'grammy';
import type { InlineKeyboardButton } from 'grammy/types';
import type { BotContext, BotDeps } from '../bot.js';
import { getChatIdentity, UNIDENTIFIED_USER_REPLY } from '../context.js';
import { buyLinkedMessage, buyUnlinkedMessage } from '../messages.js';
import { isLinked } from '../../packages/core/ports/IAccountStore.js';
import { logger } from '../../utils/logger.js';

export function checkoutButton(checkoutUrl: string, text: string = '💳 Buy credits'): InlineKeyboardButton {
  return { text, url: checkoutUrl };
}

export async function handleBuyCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  logger.info({ userId: identity.telegramUserId, command: 'buy' }, 'Telegram /buy command received');

  try {
    const account = await deps.accounts.findByTelegramId(identity.telegramUserId);
    const { settings } = deps;

    if (account && isLinked(account)) {
      await ctx.reply(buyLinkedMessage(account, settings), {
        parse_mode: 'Markdown',
        reply_markup: {
          inline_keyboard: [
            [checkoutButton(settings.checkoutUrl)],
            [{ text: "✅ I've paid", callback_data: 'check_payment' }],
          ],
        },
      });
      return;
    }

    await ctx.reply(buyUnlinkedMessage(settings), {
      parse_mode: 'Markdown',
      reply_markup: {
        inline_keyboard: [
          [{ text: '🔗 Link account first', callback_data: 'start_link' }],
          [checkoutButton(settings.checkoutUrl, '💳 Pay anyway')],
        ],
      },
    });
  } catch (error) {
    logger.error({ err: error, userId: identity.telegramUserId }, 'Error in /buy command');
    await ctx.reply('❌ Something went wrong. Please try again later.');
  }
}

export function registerBuyCommand(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.command('buy', (ctx) => handleBuyCommand(ctx, deps));
}
