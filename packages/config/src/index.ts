import { z } from 'zod';
import pino from 'pino';
import 'dotenv/config';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return value;
}, z.boolean());

// ─── Environment Schema ───────────────────────────────────────────────
export const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),

  // Redis (background job queues)
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Consumption analytics engine
  ANALYTICS_MIN_DATA_POINTS: z.coerce.number().int().min(2).default(5),
  ANALYTICS_SIGNIFICANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  ANALYTICS_CORRELATION_WINDOW_DAYS: z.coerce.number().int().positive().max(365).default(90),
  ANALYTICS_STATISTICS_WINDOW_DAYS: z.coerce.number().int().positive().max(365).default(30),

  // Background work (Analytics Service)
  ANALYTICS_STATISTICS_SWEEP_ENABLED: booleanFromEnv.default(true),
  ANALYTICS_STATISTICS_SWEEP_INTERVAL_MINUTES: z.coerce.number().int().positive().default(360),
  ANALYTICS_CORRELATION_WORKER_CONCURRENCY: z.coerce.number().int().positive().max(20).default(1),
});

// ─── Parse & Validate ─────────────────────────────────────────────────
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment configuration');
  }
  return parsed.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof envSchema>;

// ─── Structured Logger Factory ───────────────────────────────────────
export function createLogger(name: string) {
  return pino({
    name,
    level: config.LOG_LEVEL ?? (config.NODE_ENV === 'production' ? 'info' : 'debug'),
    ...(config.NODE_ENV !== 'production' && {
      transport: { target: 'pino/file', options: { destination: 1 } },
      formatters: { level: (label: string) => ({ level: label }) },
    }),
  });
}

export type Logger = ReturnType<typeof createLogger>;
