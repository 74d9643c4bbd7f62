/**
 * Create Web Account: insert an account as the web app's sign-up would
 *
 * Usage:
 *   npx tsx scripts/create-web-account.ts --email user@example.com [--free 1] [--paid 0]
 *
 * @module scripts/create-web-account
 */

import { initDatabase, closeDatabase } from '../src/db/index.js';
import { SqliteAccountStore } from '../src/packages/adapters/storage/SqliteAccountStore.js';
import { parseEmail } from '../src/utils/email.js';
import { logger } from '../src/utils/logger.js';

interface CreateArgs {
  email: string;
  free: number;
  paid: number;
}

function parseCount(flag: string, value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} must be a non-negative integer`);
  }
  return n;
}

function parseArgs(): CreateArgs {
  const args = process.argv.slice(2);
  let email: string | null = null;
  let free = 0;
  let paid = 0;

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (!value) continue;
    if (args[i] === '--email') {
      email = parseEmail(value);
      if (!email) throw new Error(`Invalid email: ${value}`);
      i++;
    } else if (args[i] === '--free') {
      free = parseCount('--free', value);
      i++;
    } else if (args[i] === '--paid') {
      paid = parseCount('--paid', value);
      i++;
    }
  }

  if (!email) {
    throw new Error('--email is required');
  }
  return { email, free, paid };
}

async function main(): Promise<void> {
  const args = parseArgs();
  const db = initDatabase();
  try {
    const account = await new SqliteAccountStore(db).createWebAccount({
      email: args.email,
      freeCredits: args.free,
      paidCredits: args.paid,
    });
    logger.info(
      { accountId: account.id, freeCredits: account.freeCredits, paidCredits: account.paidCredits },
      'Web account created'
    );
  } finally {
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to create web account');
  process.exit(1);
});
