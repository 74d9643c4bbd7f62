/**
 * Grant Credits: add paid credits to an account out of band
 *
 * Stands in for the payment side during development and support work.
 *
 * Usage:
 *   npx tsx scripts/grant-credits.ts --email user@example.com --amount 5
 *   npx tsx scripts/grant-credits.ts --telegram-id 123456789 --amount 1
 *
 * Environment:
 *   DATABASE_PATH  SQLite file shared with the bot
 *
 * @module scripts/grant-credits
 */

import { initDatabase, closeDatabase } from '../src/db/index.js';
import { SqliteAccountStore } from '../src/packages/adapters/storage/SqliteAccountStore.js';
import { totalCredits } from '../src/packages/core/ports/IAccountStore.js';
import { AccountNotFoundError } from '../src/utils/errors.js';
import { logger } from '../src/utils/logger.js';

interface GrantArgs {
  email?: string;
  telegramId?: string;
  amount: number;
}

function parseArgs(): GrantArgs {
  const args = process.argv.slice(2);
  const parsed: GrantArgs = { amount: 0 };

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--email' && value) {
      parsed.email = value;
      i++;
    } else if (args[i] === '--telegram-id' && value) {
      parsed.telegramId = value;
      i++;
    } else if (args[i] === '--amount' && value) {
      parsed.amount = Number.parseInt(value, 10);
      i++;
    }
  }

  if (!parsed.email && !parsed.telegramId) {
    throw new Error('Pass --email or --telegram-id');
  }
  if (!Number.isInteger(parsed.amount) || parsed.amount <= 0) {
    throw new Error('--amount must be a positive integer');
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs();
  const db = initDatabase();
  try {
    const store = new SqliteAccountStore(db);
    const account = args.email
      ? await store.findByEmail(args.email)
      : await store.findByTelegramId(args.telegramId ?? '');
    if (!account) {
      throw new AccountNotFoundError(args.email ?? `telegram:${args.telegramId}`);
    }

    const updated = await store.addPaidCredits(account.id, args.amount);
    logger.info(
      { accountId: updated.id, granted: args.amount, total: totalCredits(updated) },
      'Credits granted'
    );
  } finally {
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to grant credits');
  process.exit(1);
});
