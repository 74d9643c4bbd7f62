/**
 * /link and /cancel Command Handlers
 *
 * Thin adapters over the LinkingEngine: every step result is rendered by
 * linkStepMessage. Free text during an open session arrives via handleLinkText
 * from the router.
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { getChatIdentity, UNIDENTIFIED_USER_REPLY } from '../context.js';
import { linkStepMessage } from '../messages.js';
import { logger } from '../../utils/logger.js';

export async function handleLinkCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  logger.info({ userId: identity.telegramUserId, command: 'link' }, 'Telegram /link command received');

  try {
    const result = await deps.linking.begin(identity.sessionKey, identity.telegramUserId);
    await ctx.reply(linkStepMessage(result, deps.settings), { parse_mode: 'Markdown' });
  } catch (error) {
    logger.error({ err: error, userId: identity.telegramUserId }, 'Error in /link command');
    await ctx.reply(linkStepMessage({ kind: 'link_failed' }, deps.settings));
  }
}

export async function handleCancelCommand(ctx: BotContext, deps: BotDeps): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  const result = deps.linking.cancel(identity.sessionKey);
  logger.info(
    { userId: identity.telegramUserId, command: 'cancel', result: result.kind },
    'Telegram /cancel command received'
  );
  await ctx.reply(linkStepMessage(result, deps.settings));
}

/**
 * Feed a text message into the open link conversation
 */
export async function handleLinkText(ctx: BotContext, deps: BotDeps, text: string): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  try {
    const result = await deps.linking.handleText(
      identity.sessionKey,
      identity.telegramUserId,
      text,
      identity.username
    );
    if (!result) {
      return;
    }
    logger.info(
      { userId: identity.telegramUserId, step: result.kind, state: deps.linking.stateOf(identity.sessionKey) },
      'Link step handled'
    );
    await ctx.reply(linkStepMessage(result, deps.settings), { parse_mode: 'Markdown' });
  } catch (error) {
    logger.error({ err: error, userId: identity.telegramUserId }, 'Error handling link input');
    deps.linking.cancel(identity.sessionKey);
    await ctx.reply(linkStepMessage({ kind: 'link_failed' }, deps.settings));
  }
}

export function registerLinkCommands(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.command('link', (ctx) => handleLinkCommand(ctx, deps));
  bot.command('cancel', (ctx) => handleCancelCommand(ctx, deps));

  bot.callbackQuery('start_link', async (ctx) => {
    await ctx.answerCallbackQuery();
    await handleLinkCommand(ctx, deps);
  });
}
