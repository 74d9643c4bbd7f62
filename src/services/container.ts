/**
 * Service wiring
 *
 * Builds the adapters and services over one database handle. Tests pass an
 * in-memory database and replace the outward-facing ports.
 */

import type Database from 'better-sqlite3';
import type { Config } from '../config.js';
import type { IAccountStore } from '../packages/core/ports/IAccountStore.js';
import type { ICreditReconciler } from '../packages/core/ports/ICreditReconciler.js';
import type { IOtpRegistry } from '../packages/core/ports/IOtpRegistry.js';
import type { INotifier } from '../packages/core/ports/INotifier.js';
import type { IQuestionGenerator } from '../packages/core/ports/IQuestionGenerator.js';
import { SqliteAccountStore } from '../packages/adapters/storage/SqliteAccountStore.js';
import { SqliteOtpRegistry } from '../packages/adapters/storage/SqliteOtpRegistry.js';
import { CreditReconcilerAdapter } from '../packages/adapters/billing/CreditReconcilerAdapter.js';
import { createResendNotifier } from '../packages/adapters/email/ResendNotifier.js';
import { createQuestionGenerator } from '../packages/adapters/generation/AnthropicQuestionGenerator.js';
import { LinkSessionStore, LinkingEngine } from '../packages/linking/index.js';
import { VerificationService } from './VerificationService.js';

export interface AppServices {
  db: Database.Database;
  accounts: IAccountStore;
  reconciler: ICreditReconciler;
  otpRegistry: IOtpRegistry;
  notifier: INotifier;
  generator: IQuestionGenerator;
  verification: VerificationService;
  sessions: LinkSessionStore;
  linking: LinkingEngine;
}

export interface ServiceOverrides {
  notifier?: INotifier;
  generator?: IQuestionGenerator;
  now?: () => Date;
}

export function createAppServices(
  db: Database.Database,
  cfg: Config,
  overrides: ServiceOverrides = {}
): AppServices {
  const now = overrides.now ?? (() => new Date());

  const accounts = new SqliteAccountStore(db, now);
  const reconciler = new CreditReconcilerAdapter(db, now);
  const otpRegistry = new SqliteOtpRegistry(db);

  const notifier =
    overrides.notifier ??
    createResendNotifier({
      apiKey: cfg.email.resendApiKey,
      from: cfg.email.from,
      ttlMinutes: cfg.otp.ttlMinutes,
    });

  const generator = overrides.generator ?? createGenerator(cfg);

  const verification = new VerificationService(otpRegistry, notifier, {
    ttlSeconds: cfg.otp.ttlMinutes * 60,
    now,
  });
  const sessions = new LinkSessionStore({ ttl: cfg.linking.sessionTtlMinutes * 60, now });
  const linking = new LinkingEngine({ accounts, reconciler, verification, sessions });

  return { db, accounts, reconciler, otpRegistry, notifier, generator, verification, sessions, linking };
}

function createGenerator(cfg: Config): IQuestionGenerator {
  const apiKey = cfg.generation.anthropicApiKey;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY is required');
  }
  return createQuestionGenerator({
    apiKey,
    model: cfg.generation.model,
    maxTokens: cfg.generation.maxTokens,
    timeoutMs: cfg.generation.timeoutMs,
    promptPath: cfg.generation.promptPath,
  });
}
