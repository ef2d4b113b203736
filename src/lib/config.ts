/**
 * Application Configuration
 * Parses process.env once into a typed AppConfig
 */

import { z } from 'zod';

import type { AccessPolicy } from '../types/index.js';

function tokenList() {
  return z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0)
    );
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  SUPABASE_URL: z.string().url('SUPABASE_URL must be a URL'),
  SUPABASE_SERVICE_KEY: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),

  UPSTASH_REDIS_URL: z.string().optional(),
  UPSTASH_REDIS_TOKEN: z.string().optional(),

  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
  GROUP_CHAT_ID: z.coerce
    .number()
    .int()
    .negative('GROUP_CHAT_ID must be negative for groups/supergroups'),

  INGEST_TOKENS: tokenList(),
  OPERATOR_TOKENS: tokenList(),

  PLAN_DAYS: z.coerce.number().int().positive().default(30),
  RENEWAL_PERIOD_DAYS: z.coerce.number().int().positive().default(30),
  GRACE_HOURS: z.coerce.number().int().min(0).default(48),
  RECONCILE_WINDOW_DAYS: z.coerce.number().positive().default(3),
  RECONCILE_LOOKBACK_MULTIPLIER: z.coerce.number().min(1).default(2),
  RECONCILE_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  REMINDER_DAYS_BEFORE_EXPIRY: z.coerce.number().int().min(0).default(3),
  INVITE_TTL_MINUTES: z.coerce.number().int().positive().default(5),
  JOB_LEASE_SECONDS: z.coerce.number().int().positive().default(900),
});

export interface AppConfig {
  port: number;
  logLevel: string;
  supabase: { url: string; serviceKey: string };
  redis: { url: string; token: string } | null;
  telegram: { botToken: string; groupChatId: number };
  ingestTokens: string[];
  operatorTokens: string[];
  jobLeaseSeconds: number;
  policy: AccessPolicy;
}

/**
 * Parse configuration from an environment map.
 * Throws with every invalid key listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  const redisUrl = e.UPSTASH_REDIS_URL ?? '';
  const redisToken = e.UPSTASH_REDIS_TOKEN ?? '';

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    supabase: { url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_KEY },
    redis:
      redisUrl !== '' && redisToken !== ''
        ? { url: redisUrl, token: redisToken }
        : null,
    telegram: { botToken: e.BOT_TOKEN, groupChatId: e.GROUP_CHAT_ID },
    ingestTokens: e.INGEST_TOKENS,
    operatorTokens: e.OPERATOR_TOKENS,
    jobLeaseSeconds: e.JOB_LEASE_SECONDS,
    policy: {
      planDays: e.PLAN_DAYS,
      renewalPeriodDays: e.RENEWAL_PERIOD_DAYS,
      graceHours: e.GRACE_HOURS,
      reconcileWindowDays: e.RECONCILE_WINDOW_DAYS,
      reconcileLookbackMultiplier: e.RECONCILE_LOOKBACK_MULTIPLIER,
      reconcilePageSize: e.RECONCILE_PAGE_SIZE,
      reminderDaysBeforeExpiry: e.REMINDER_DAYS_BEFORE_EXPIRY,
      inviteTtlMinutes: e.INVITE_TTL_MINUTES,
    },
  };
}
