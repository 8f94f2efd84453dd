// src/config.ts
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { INDEX_NAMES, isIndexName } from './indices';
import { isHhMm } from './marketClock';
import { IndexName } from './types';

const intFrom = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  PORT: intFrom(3000, 1),

  // Kite Connect; the feed stays off without both
  KITE_API_KEY: z.string().optional(),
  KITE_ACCESS_TOKEN: z.string().optional(),

  MARKET_CLOSE: z.string().refine(isHhMm, 'MARKET_CLOSE must be HH:MM').default('15:30'),
  INDICES: z
    .string()
    .default('NIFTY,BANKNIFTY')
    .transform((raw, ctx) => {
      const names: IndexName[] = [];
      for (const part of raw.split(',').map((s) => s.trim().toUpperCase()).filter(Boolean)) {
        if (!isIndexName(part)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown index ${part} (expected one of ${INDEX_NAMES.join(', ')})`,
          });
          return z.NEVER;
        }
        if (!names.includes(part)) names.push(part);
      }
      return names;
    }),
  STRIKES_RANGE: intFrom(15, 0),

  PHASE_INTERVAL_MS: intFrom(1_000, 10),
  TICK_QUEUE_MAX: intFrom(10_000, 1),
  TICK_WORKERS: intFrom(4, 1),
  CLOCK_SKEW_TOLERANCE_MS: intFrom(5_000, 0),

  NOTIFY_QUEUE_MAX: intFrom(1_000, 1),
  NEAR_TARGET_THRESHOLD: z.coerce.number().min(0).default(15),
  NOTIFY_WEBHOOK_URL: z.string().url().optional(),

  CHECKPOINT_DIR: z.string().default('state'),
  CHECKPOINT_INTERVAL_MS: intFrom(5_000, 100),
  TICK_ARCHIVE_DIR: z.string().default('logs/ticks'),
  TICK_ARCHIVE_KEEP_DAYS: intFrom(7, 1),
  RETENTION_MINUTES: intFrom(24 * 60, 0),

  DASHBOARD_THROTTLE_MS: intFrom(250, 0),
  CORS_ORIGINS: z.string().default('*'),
});

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * The env file to read before parsing: KITE_ENV_PATH when it names a file,
 * else `.env.kite` (Kite credentials kept apart), else `.env`.
 */
export function findEnvFile(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string | null {
  const explicit = env.KITE_ENV_PATH?.trim();
  const candidates = [
    ...(explicit ? [path.resolve(cwd, explicit)] : []),
    path.resolve(cwd, '.env.kite'),
    path.resolve(cwd, '.env'),
  ];
  return candidates.find((file) => fs.existsSync(file)) ?? null;
}

// Values already in the environment win over the file.
export function loadEnvFile(cwd = process.cwd()): string | null {
  const file = findEnvFile(process.env, cwd);
  if (file) dotenv.config({ path: file });
  return file;
}

// Throws (ZodError) on the first invalid value; call once at startup.
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  // Empty values in .env files mean "unset"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  const parsed = envSchema.parse(cleaned);

  return {
    port: parsed.PORT,
    kite: {
      apiKey: parsed.KITE_API_KEY ?? null,
      accessToken: parsed.KITE_ACCESS_TOKEN ?? null,
    },
    market: {
      close: parsed.MARKET_CLOSE,
      indices: parsed.INDICES,
      strikesRange: parsed.STRIKES_RANGE,
    },
    engine: {
      phaseIntervalMs: parsed.PHASE_INTERVAL_MS,
      tickQueueMax: parsed.TICK_QUEUE_MAX,
      tickWorkers: parsed.TICK_WORKERS,
      clockSkewToleranceMs: parsed.CLOCK_SKEW_TOLERANCE_MS,
      retentionMinutes: parsed.RETENTION_MINUTES,
    },
    notify: {
      queueMax: parsed.NOTIFY_QUEUE_MAX,
      nearThreshold: parsed.NEAR_TARGET_THRESHOLD,
      webhookUrl: parsed.NOTIFY_WEBHOOK_URL ?? null,
    },
    storage: {
      checkpointDir: parsed.CHECKPOINT_DIR,
      checkpointIntervalMs: parsed.CHECKPOINT_INTERVAL_MS,
      tickArchiveDir: parsed.TICK_ARCHIVE_DIR,
      tickArchiveKeepDays: parsed.TICK_ARCHIVE_KEEP_DAYS,
    },
    dashboard: {
      throttleMs: parsed.DASHBOARD_THROTTLE_MS,
      corsOrigins: parsed.CORS_ORIGINS === '*'
        ? '*'
        : parsed.CORS_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean),
    },
  } as const;
}
