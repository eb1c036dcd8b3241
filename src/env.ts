import { config } from 'dotenv';
import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v === undefined || v === '' ? undefined : v));

/**
 * Schema for all environment variables consumed by the bot.
 * Required variables will cause a hard failure at startup if missing;
 * optional variables fall back to sensible defaults.
 */
const envSchema = z
  .object({
    // ---------- General ----------
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    PORT: z.coerce.number().int().positive().default(3000),

    // ---------- Database ----------
    DATABASE_PATH: z.string().default('./data/dropwatch.db'),

    // ---------- Telegram ----------
    BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
    /** Operational channel for source-down, degraded scoring and digests. */
    ADMIN_CHAT_ID: optionalString,

    // ---------- Cadences ----------
    LIVE_INTERVAL_SECONDS: z.coerce.number().int().min(1).max(3600).default(60),
    INTERVAL_MINUTES: z.coerce.number().int().min(1).max(1440).default(16),
    DAILY_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(9),
    KEEP_ALIVE_MINUTES: z.coerce.number().int().min(1).max(59).default(4),
    UPTIME_URL: optionalString.pipe(z.string().url().optional()),

    // ---------- Batch sizes ----------
    LIVE_BATCH_SIZE: z.coerce.number().int().positive().default(25),
    INTERVAL_BATCH_SIZE: z.coerce.number().int().positive().default(40),
    DAILY_BATCH_SIZE: z.coerce.number().int().positive().default(50),
    DIGEST_SIZE: z.coerce.number().int().positive().default(12),

    // ---------- Dedup / eligibility ----------
    COOLDOWN_HOURS: z.coerce.number().positive().default(24),
    RANK_FLOOR: z.coerce.number().default(40),
    IMMEDIATE_REWARD_MIN: z.coerce.number().nonnegative().default(100),
    IMMEDIATE_REWARD_MAX: z.coerce.number().nonnegative().default(1000),

    // ---------- Delivery ----------
    SEND_DELAY_MS: z.coerce.number().int().nonnegative().default(150),

    // ---------- Scoring ----------
    SCAM_THRESHOLD: z.coerce.number().min(0).max(100).default(30),
    SUSPICIOUS_THRESHOLD: z.coerce.number().min(0).max(100).default(15),
    EXTERNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    QUARANTINE_AFTER_FAILURES: z.coerce.number().int().positive().default(3),

    // ---------- Source ----------
    SOURCE_BASE_URL: z.string().url().default('https://zealy.io'),
    SOURCE_API_URL: z.string().url().default('https://api-v2.zealy.io/public'),

    // ---------- External signals (optional) ----------
    SAFE_BROWSING_KEY: optionalString,
    ETHERSCAN_API_KEY: optionalString,
    WHOIS_API_KEY: optionalString,
    TWITTER_BEARER_TOKEN: optionalString,
  })
  .superRefine((value, ctx) => {
    if (value.SUSPICIOUS_THRESHOLD > value.SCAM_THRESHOLD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUSPICIOUS_THRESHOLD'],
        message: 'SUSPICIOUS_THRESHOLD must not exceed SCAM_THRESHOLD',
      });
    }
    if (value.IMMEDIATE_REWARD_MIN >= value.IMMEDIATE_REWARD_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['IMMEDIATE_REWARD_MIN'],
        message: 'IMMEDIATE_REWARD_MIN must be below IMMEDIATE_REWARD_MAX',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables:\n${issues.join('\n')}`);
    this.name = 'EnvValidationError';
  }
}

/**
 * Validates a raw environment map. Throws `EnvValidationError` listing
 * every offending variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
    );
    throw new EnvValidationError(formatted);
  }

  return result.data;
}

/**
 * Loads `.env` (if present) into process.env and returns the typed,
 * validated configuration. Only the process entry point calls this.
 */
export function loadEnv(): Env {
  config();
  return parseEnv(process.env);
}
