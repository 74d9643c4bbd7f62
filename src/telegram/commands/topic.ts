/**
 * Topic requests (free text outside a link conversation)
 *
 * Flow: validate length → take one credit → "generating" notice → generate →
 * chunked reply → .txt attachment → remaining balance.
 *
 * The credit is taken before generation starts. It is only returned on a
 * generation failure when credits.refundOnGenerationFailure is enabled.
 */

import { InputFile } from 'grammy';
import type { BotContext, BotDeps } from '../bot.js';
import { getChatIdentity, UNIDENTIFIED_USER_REPLY } from '../context.js';
import { checkoutButton } from './buy.js';
import {
  buildQuestionFile,
  chunkText,
  generatingMessage,
  generationFailedMessage,
  noAccountMessage,
  noCreditsMessage,
  remainingCreditsMessage,
  topicTooLongMessage,
  topicTooShortMessage,
} from '../messages.js';
import { totalCredits } from '../../packages/core/ports/IAccountStore.js';
import type { CreditSource } from '../../packages/core/ports/ICreditReconciler.js';
import { logError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type TopicCheck = 'ok' | 'too_short' | 'too_long';

export function checkTopicLength(topic: string, minLength: number, maxLength: number): TopicCheck {
  if (topic.length < minLength) return 'too_short';
  if (topic.length > maxLength) return 'too_long';
  return 'ok';
}

export async function handleTopicMessage(ctx: BotContext, deps: BotDeps, text: string): Promise<void> {
  const identity = getChatIdentity(ctx);
  if (!identity) {
    await ctx.reply(UNIDENTIFIED_USER_REPLY);
    return;
  }

  const { settings } = deps;
  const topic = text.trim();

  // Length is checked before credits so a bad request never costs anything
  const check = checkTopicLength(topic, settings.topicMinLength, settings.topicMaxLength);
  if (check === 'too_short') {
    await ctx.reply(topicTooShortMessage(settings), { parse_mode: 'Markdown' });
    return;
  }
  if (check === 'too_long') {
    await ctx.reply(topicTooLongMessage(settings));
    return;
  }

  const userId = identity.telegramUserId;

  let accountId: string;
  let source: CreditSource;
  let remaining: number;
  try {
    await deps.accounts.ensurePlaceholder({
      telegramUserId: userId,
      telegramUsername: identity.username,
      freeCredits: settings.signupFreeCredits,
    });

    const spend = await deps.reconciler.spend(userId);
    if (!spend.ok) {
      if (spend.reason === 'no_account') {
        await ctx.reply(noAccountMessage());
        return;
      }
      logger.info({ userId, accountId: spend.account.id }, 'Topic rejected: no credits');
      await ctx.reply(noCreditsMessage(settings), {
        parse_mode: 'Markdown',
        reply_markup: { inline_keyboard: [[checkoutButton(settings.checkoutUrl)]] },
      });
      return;
    }
    accountId = spend.account.id;
    source = spend.source;
    remaining = totalCredits(spend.account);
  } catch (error) {
    logError(error, { operation: 'spendCredit', userId });
    await ctx.reply('❌ Something went wrong. No credit was used; please try again later.');
    return;
  }

  logger.info({ userId, accountId, source, topicLength: topic.length }, 'Generating question set');
  const noticeId = await sendNotice(ctx, topic);

  let questions: string;
  try {
    questions = await deps.generator.generate(topic);
  } catch (error) {
    logError(error, { operation: 'generateQuestions', userId, accountId });
    await deleteNotice(ctx, noticeId);

    let refunded = false;
    if (settings.refundOnGenerationFailure) {
      try {
        await deps.reconciler.refund(accountId, source);
        refunded = true;
      } catch (refundError) {
        logError(refundError, { operation: 'refundCredit', userId, accountId });
      }
    }
    await ctx.reply(generationFailedMessage(refunded));
    return;
  }

  await deleteNotice(ctx, noticeId);

  for (const chunk of chunkText(questions)) {
    await ctx.reply(chunk);
  }

  const file = buildQuestionFile(topic, questions, new Date());
  await ctx.replyWithDocument(new InputFile(Buffer.from(file.content, 'utf8'), file.filename), {
    caption: '📄 Download your questions',
  });

  await ctx.reply(remainingCreditsMessage(remaining), { parse_mode: 'Markdown' });
}

/**
 * Post the progress notice. The credit is already spent at this point, so a
 * failed send is logged and generation goes ahead without it.
 */
async function sendNotice(ctx: BotContext, topic: string): Promise<number | null> {
  try {
    const notice = await ctx.reply(generatingMessage(topic), { parse_mode: 'Markdown' });
    return notice.message_id;
  } catch (error) {
    logger.warn({ err: error, chatId: ctx.chat?.id }, 'Failed to send progress notice');
    return null;
  }
}

async function deleteNotice(ctx: BotContext, messageId: number | null): Promise<void> {
  const chatId = ctx.chat?.id;
  if (chatId === undefined || messageId === null) return;
  try {
    await ctx.api.deleteMessage(chatId, messageId);
  } catch (error) {
    logger.warn({ err: error, chatId, messageId }, 'Failed to delete progress notice');
  }
}
