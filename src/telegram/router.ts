/**
 * Free-text routing
 *
 * Registered after the commands: text that reaches this handler is either
 * input for an open link conversation or a topic request.
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDeps } from './bot.js';
import { getChatIdentity } from './context.js';
import { handleLinkText } from './commands/link.js';
import { handleTopicMessage } from './commands/topic.js';

export async function routeTextMessage(ctx: BotContext, deps: BotDeps, text: string): Promise<void> {
  // Unknown commands are ignored rather than treated as topics
  if (text.startsWith('/')) {
    return;
  }

  const identity = getChatIdentity(ctx);
  if (identity && deps.linking.hasOpenSession(identity.sessionKey)) {
    await handleLinkText(ctx, deps, text);
    return;
  }

  await handleTopicMessage(ctx, deps, text);
}

export function registerTextRouter(bot: Bot<BotContext>, deps: BotDeps): void {
  bot.on('message:text', (ctx) => routeTextMessage(ctx, deps, ctx.message.text));
}
