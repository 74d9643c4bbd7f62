/**
 * Quizbridge entry point
 *
 * Telegram bot that turns topics into practice question sets, paid for with
 * credits shared with the web app through verified email linking.
 */

import { config, getMissingStartupConfig } from './config.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase, OTP_RETENTION_SECONDS } from './db/index.js';
import { createAppServices, type AppServices } from './services/container.js';
import { createApp, startServer, stopServer } from './api/server.js';
import {
  botSettingsFromConfig,
  createBot,
  createTelegramWebhookHandler,
  startTelegramBot,
  stopTelegramBot,
} from './telegram/bot.js';
import { publishCommandMenu, registerAllCommands } from './telegram/commands/index.js';

/** Session sweep / passcode purge interval */
const HOUSEKEEPING_INTERVAL_MS = 60 * 1000;

function startHousekeeping(services: AppServices): NodeJS.Timeout {
  const timer = setInterval(() => {
    services.sessions.sweep();
    const cutoff = new Date(Date.now() - OTP_RETENTION_SECONDS * 1000);
    services.verification.purgeExpired(cutoff).catch((error: unknown) => {
      logger.warn({ err: error }, 'Passcode purge failed');
    });
  }, HOUSEKEEPING_INTERVAL_MS);
  timer.unref();
  return timer;
}

async function main(): Promise<void> {
  const missing = getMissingStartupConfig(config);
  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }
  const token = config.telegram.botToken;
  if (!token) {
    throw new Error('TELEGRAM_BOT_TOKEN is required');
  }

  logger.info(
    { mode: config.telegram.mode, port: config.api.port, database: config.database.path },
    'Starting Quizbridge'
  );

  const db = initDatabase();
  const services = createAppServices(db, config);

  const bot = createBot(
    token,
    {
      accounts: services.accounts,
      reconciler: services.reconciler,
      linking: services.linking,
      generator: services.generator,
      settings: botSettingsFromConfig(config),
    },
    registerAllCommands
  );

  const app = createApp({
    db,
    telegramMode: config.telegram.mode,
    webhookHandler:
      config.telegram.mode === 'webhook'
        ? createTelegramWebhookHandler(bot, config.telegram.webhookSecret)
        : undefined,
  });
  await startServer(app, config.api.port, config.api.host);

  await startTelegramBot(bot, config);
  await publishCommandMenu(bot);

  const housekeeping = startHousekeeping(services);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    clearInterval(housekeeping);
    await stopTelegramBot();
    await stopServer();
    closeDatabase();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error, signal }, 'Error during shutdown');
        process.exit(1);
      });
    });
  }

  logger.info('Quizbridge started successfully');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start Quizbridge');
  process.exit(1);
});
