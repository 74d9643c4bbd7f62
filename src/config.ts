import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Boolean flags arrive as strings; z.coerce.boolean() would treat "false" as true
 */
const booleanFlagSchema = z
  .string()
  .transform((val) => ['1', 'true', 'yes', 'on'].includes(val.trim().toLowerCase()));

/**
 * Configuration schema with Zod validation
 */
const configSchema = z
  .object({
    // Telegram Configuration
    telegram: z.object({
      botToken: z.string().optional(),
      mode: z.enum(['polling', 'webhook']).default('polling'),
      webhookUrl: z.string().url().optional(),
      webhookSecret: z.string().optional(),
    }),

    // Database Configuration
    database: z.object({
      path: z.string().min(1),
    }),

    // Logging Configuration
    logging: z.object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    }),

    // API Configuration (health check + webhook)
    api: z.object({
      port: z.coerce.number().int().min(1).max(65535).default(3000),
      host: z.string().default('0.0.0.0'),
    }),

    // Question generation (Anthropic Messages API)
    generation: z.object({
      anthropicApiKey: z.string().optional(),
      model: z.string().min(1).default('claude-sonnet-4-20250514'),
      maxTokens: z.coerce.number().int().min(256).max(16000).default(4000),
      timeoutMs: z.coerce.number().int().min(1000).max(300000).default(120000),
      promptPath: z.string().min(1).default('./prompts/question-set.txt'),
    }),

    // Passcode email delivery (Resend)
    email: z.object({
      resendApiKey: z.string().optional(),
      from: z.string().min(1).default('Quizbridge <noreply@quizbridge.app>'),
    }),

    // Payments are captured elsewhere; the bot only links to checkout
    payment: z.object({
      checkoutUrl: z.string().url(),
      priceLabel: z.string().min(1).default('₹12'),
    }),

    credits: z.object({
      signupFreeCredits: z.coerce.number().int().min(0).max(100).default(1),
      refundOnGenerationFailure: booleanFlagSchema,
    }),

    otp: z.object({
      ttlMinutes: z.coerce.number().int().min(1).max(60).default(10),
    }),

    linking: z.object({
      sessionTtlMinutes: z.coerce.number().int().min(1).max(1440).default(15),
    }),

    topic: z.object({
      minLength: z.coerce.number().int().min(1).default(5),
      maxLength: z.coerce.number().int().min(1).default(500),
    }),

    web: z.object({
      appUrl: z.string().url(),
      supportContact: z.string().min(1),
    }),
  })
  .refine((cfg) => cfg.topic.minLength <= cfg.topic.maxLength, {
    message: 'TOPIC_MIN_LENGTH must not exceed TOPIC_MAX_LENGTH',
    path: ['topic', 'minLength'],
  })
  .refine((cfg) => cfg.telegram.mode !== 'webhook' || cfg.telegram.webhookUrl !== undefined, {
    message: 'TELEGRAM_WEBHOOK_URL is required in webhook mode',
    path: ['telegram', 'webhookUrl'],
  });

/**
 * Typed configuration object
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      mode: env.TELEGRAM_MODE ?? 'polling',
      webhookUrl: env.TELEGRAM_WEBHOOK_URL,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    },
    database: {
      path: env.DATABASE_PATH ?? './data/quizbridge.db',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
    },
    api: {
      port: env.API_PORT ?? '3000',
      host: env.API_HOST ?? '0.0.0.0',
    },
    generation: {
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: env.GENERATION_MAX_TOKENS,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      promptPath: env.GENERATION_PROMPT_PATH,
    },
    email: {
      resendApiKey: env.RESEND_API_KEY,
      from: env.EMAIL_FROM,
    },
    payment: {
      checkoutUrl: env.PAYMENT_CHECKOUT_URL ?? 'https://quizbridge.app/buy',
      priceLabel: env.CREDIT_PRICE_LABEL,
    },
    credits: {
      signupFreeCredits: env.SIGNUP_FREE_CREDITS,
      refundOnGenerationFailure: env.REFUND_ON_GENERATION_FAILURE ?? 'false',
    },
    otp: {
      ttlMinutes: env.OTP_TTL_MINUTES,
    },
    linking: {
      sessionTtlMinutes: env.LINK_SESSION_TTL_MINUTES,
    },
    topic: {
      minLength: env.TOPIC_MIN_LENGTH,
      maxLength: env.TOPIC_MAX_LENGTH,
    },
    web: {
      appUrl: env.WEB_APP_URL ?? 'https://quizbridge.app',
      supportContact: env.SUPPORT_CONTACT ?? '@quizbridge_support',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Parse configuration at module load time
export const config: Config = parseConfig();

/**
 * List the settings the bot cannot start without
 */
export function getMissingStartupConfig(cfg: Config = config): string[] {
  const missing: string[] = [];
  if (!cfg.telegram.botToken) missing.push('TELEGRAM_BOT_TOKEN');
  if (!cfg.generation.anthropicApiKey) missing.push('ANTHROPIC_API_KEY');
  if (cfg.telegram.mode === 'webhook' && !cfg.telegram.webhookSecret) {
    missing.push('TELEGRAM_WEBHOOK_SECRET');
  }
  return missing;
}

/**
 * Check if the bot receives updates through the webhook endpoint
 */
export function isTelegramWebhookMode(cfg: Config = config): boolean {
  return cfg.telegram.mode === 'webhook';
}
