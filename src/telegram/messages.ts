/**
 * Telegram message rendering
 *
 * All user-facing text lives here so handlers only decide *which* message to
 * send. Messages use legacy Markdown; user-supplied values go through
 * escapeMarkdown first.
 */

import type { Account } from '../packages/core/ports/IAccountStore.js';
import { totalCredits, isLinked } from '../packages/core/ports/IAccountStore.js';
import type { LinkStepResult } from '../packages/linking/index.js';

/** Telegram rejects messages above 4096 characters; leave room for the prefix */
export const MESSAGE_CHUNK_SIZE = 4000;

export const CONTINUED_PREFIX = '...continued\n\n';

export interface MessageSettings {
  priceLabel: string;
  appUrl: string;
  supportContact: string;
  otpTtlMinutes: number;
  topicMinLength: number;
  topicMaxLength: number;
}

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

/**
 * Escape characters that legacy Markdown treats as entity markers.
 * Only valid outside an entity: Telegram does not unescape inside *bold* or
 * _italic_, so escaped values are never wrapped in one.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

/**
 * Split text into Telegram-sized chunks; every chunk after the first carries
 * the continuation prefix.
 */
export function chunkText(text: string, size: number = MESSAGE_CHUNK_SIZE): string[] {
  if (text.length <= size) {
    return [text];
  }
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    const part = text.slice(i, i + size);
    chunks.push(i === 0 ? part : `${CONTINUED_PREFIX}${part}`);
  }
  return chunks;
}

/**
 * Format a Date as "YYYY-MM-DD HH:MM UTC"
 */
export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

/**
 * Downloadable copy of a generated question set
 */
export function buildQuestionFile(
  topic: string,
  questions: string,
  generatedAt: Date
): { filename: string; content: string } {
  const slug = topic
    .slice(0, 30)
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  const content = [
    'Practice Questions',
    `Topic: ${topic}`,
    `Generated: ${formatUtcTimestamp(generatedAt)}`,
    '='.repeat(50),
    '',
    questions,
  ].join('\n');
  return { filename: `questions_${slug || 'topic'}.txt`, content };
}

function linkStatusLine(account: Account): string {
  return isLinked(account) && account.email
    ? `🔗 Linked to ${escapeMarkdown(account.email)}`
    : '🔓 Not linked to a web account (/link)';
}

// --------------------------------------------------------------------------
// Account messages
// --------------------------------------------------------------------------

export function welcomeNewMessage(account: Account, settings: MessageSettings): string {
  return [
    '🎯 *Practice Question Bot*',
    '',
    `🎁 You have *${totalCredits(account)}* free credit${totalCredits(account) === 1 ? '' : 's'} to start with.`,
    '',
    '*How it works*',
    'Send any topic and get a full practice set: multiple-choice questions with explanations and long-form questions with answer outlines.',
    '',
    '1. Type a topic, e.g. `Monetary policy and inflation targeting`',
    '2. Wait 20-30 seconds',
    '3. Read the questions here or download the text file',
    '',
    '*One balance, two apps*',
    `Already use ${escapeMarkdown(settings.appUrl)}? Run /link to share your credits between the web app and this chat.`,
    '',
    '/help shows every command.',
  ].join('\n');
}

export function welcomeBackMessage(account: Account): string {
  return [
    '👋 *Welcome back!*',
    '',
    `💳 Credits: *${totalCredits(account)}* (free ${account.freeCredits}, paid ${account.paidCredits})`,
    linkStatusLine(account),
    '',
    'Send a topic to generate questions.',
  ].join('\n');
}

export function creditsMessage(account: Account): string {
  return [
    '💳 *Your Credits*',
    '',
    `Free: ${account.freeCredits}`,
    `Paid: ${account.paidCredits}`,
    `*Total: ${totalCredits(account)}*`,
    '',
    `Question sets generated: ${account.totalQueries}`,
    linkStatusLine(account),
  ].join('\n');
}

export function noAccountMessage(): string {
  return '❌ No account found yet. Send /start to create one.';
}

export function helpMessage(settings: MessageSettings): string {
  return [
    '📖 *Help*',
    '',
    '*Commands*',
    '/start - create your account or see your balance',
    '/credits - show your credit balance',
    '/buy - buy more credits',
    '/paid - refresh your balance after paying',
    '/link - link this chat to your web account',
    '/cancel - stop linking',
    '/help - this message',
    '',
    '*Credits*',
    `Each question set costs 1 credit. Free credits are used before paid ones. Extra credits cost ${escapeMarkdown(settings.priceLabel)} each.`,
    '',
    '*Topics*',
    `Send a topic between ${settings.topicMinLength} and ${settings.topicMaxLength} characters.`,
    '',
    '*Linking*',
    `Sign up at ${escapeMarkdown(settings.appUrl)}, then use /link here with the same email. Credits from both places are combined into one balance.`,
    '',
    `Questions? Contact ${escapeMarkdown(settings.supportContact)}`,
  ].join('\n');
}

// --------------------------------------------------------------------------
// Purchase messages
// --------------------------------------------------------------------------

export function buyLinkedMessage(account: Account, settings: MessageSettings): string {
  return [
    '💳 *Buy Credits*',
    '',
    `${escapeMarkdown(settings.priceLabel)} per credit.`,
    '',
    `⚠️ Pay with your linked email ${escapeMarkdown(account.email ?? '')} so the credits land on this account.`,
    '',
    'Tap *I\'ve paid* once the payment is done.',
  ].join('\n');
}

export function buyUnlinkedMessage(settings: MessageSettings): string {
  return [
    '💳 *Buy Credits*',
    '',
    `${escapeMarkdown(settings.priceLabel)} per credit.`,
    '',
    'Purchases are credited to a web account by email, so link this chat first. Otherwise the credits will not show up here.',
  ].join('\n');
}

export function paidNotLinkedMessage(): string {
  return '🔗 Link your web account first with /link. Purchases are matched to your account by email.';
}

export function paidBalanceMessage(account: Account): string {
  return [
    '✅ *Balance refreshed*',
    '',
    `💳 Credits: *${totalCredits(account)}* (free ${account.freeCredits}, paid ${account.paidCredits})`,
    '',
    'Payments can take a minute to arrive. If your purchase is missing, tap the button again shortly.',
  ].join('\n');
}

// --------------------------------------------------------------------------
// Topic messages
// --------------------------------------------------------------------------

export function topicTooShortMessage(settings: MessageSettings): string {
  return `⚠️ Topic too short. Use at least ${settings.topicMinLength} characters.\n\n*Example:* Judicial review of executive ordinances`;
}

export function topicTooLongMessage(settings: MessageSettings): string {
  return `⚠️ Topic too long. Keep it under ${settings.topicMaxLength} characters.`;
}

export function noCreditsMessage(settings: MessageSettings): string {
  return `❌ *No credits remaining!*\n\nUse /buy to get more (${escapeMarkdown(settings.priceLabel)} each).`;
}

export function generatingMessage(topic: string): string {
  return `⏳ *Generating questions...*\n\nTopic: ${escapeMarkdown(topic)}\n\nThis takes 20-30 seconds.`;
}

export function generationFailedMessage(refunded: boolean): string {
  return refunded
    ? '❌ Question generation failed. Your credit has been returned; please try again.'
    : '❌ Question generation failed. Please try again later.';
}

export function remainingCreditsMessage(remaining: number): string {
  return `💳 *Credits remaining:* ${remaining}\n\nSend another topic or /buy for more.`;
}

// --------------------------------------------------------------------------
// Linking messages
// --------------------------------------------------------------------------

/**
 * Reply text for each step of the link conversation
 */
export function linkStepMessage(result: LinkStepResult, settings: MessageSettings): string {
  switch (result.kind) {
    case 'already_linked':
      return `✅ This chat is already linked to ${escapeMarkdown(result.email)}.`;
    case 'awaiting_email':
      return [
        '🔗 *Link your web account*',
        '',
        'Send the email address you use on the web app.',
        '',
        'Send /cancel to stop.',
      ].join('\n');
    case 'invalid_email':
      return '⚠️ That does not look like an email address. Try again or /cancel.';
    case 'account_not_found':
      return [
        `❌ No web account uses ${escapeMarkdown(result.email)}.`,
        '',
        `Sign up at ${escapeMarkdown(settings.appUrl)} first, then send the email again, or /cancel.`,
      ].join('\n');
    case 'email_taken':
      return `❌ That email is already linked to another Telegram account. Contact ${escapeMarkdown(settings.supportContact)} if this is wrong.`;
    case 'code_send_failed':
      return '❌ Could not send the verification code. Send your email again to retry, or /cancel.';
    case 'code_sent':
      return [
        `📧 A 6-digit code was sent to ${escapeMarkdown(result.email)}.`,
        '',
        `Send it here. It expires in ${settings.otpTtlMinutes} minutes.`,
      ].join('\n');
    case 'invalid_code':
      return '⚠️ The code is 6 digits. Send it again or /cancel.';
    case 'verification_unavailable':
      return '❌ Could not check the code right now. Send it again in a moment, or /cancel.';
    case 'verification_failed':
      return result.reason === 'expired'
        ? '❌ That code has expired. Use /link to get a new one.'
        : '❌ Invalid code. Use /link to start again.';
    case 'linked':
      return [
        '✅ *Account linked!*',
        '',
        `Email: ${escapeMarkdown(result.email)}`,
        `💳 Credits: *${result.freeCredits + result.paidCredits}* (free ${result.freeCredits}, paid ${result.paidCredits})`,
        '',
        'Credits are now shared between this chat and the web app.',
      ].join('\n');
    case 'link_integrity_error':
      return `⚠️ This chat and that email belong to two different accounts, so they were not merged. No credits were changed. Contact ${escapeMarkdown(settings.supportContact)}.`;
    case 'link_failed':
      return '❌ Linking failed. Please try /link again later.';
    case 'cancelled':
      return '❌ Linking cancelled.';
    case 'nothing_to_cancel':
      return 'Nothing to cancel.';
  }
}
