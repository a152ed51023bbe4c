/**
 * Application configuration
 *
 * Parsed once from process.env (after dotenv has loaded .env) into a typed
 * AppConfig. Invalid values fail startup with every offending variable
 * listed.
 */

import { z } from 'zod';

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_DATABASE: z.string().default('analytics'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.preprocess(emptyToUndefined, z.string().optional()),
  DB_POOL_SIZE: z.coerce.number().int().min(1).max(200).default(20),

  REDIS_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),

  QUERY_TIMEOUT_SECONDS: positiveNumber(30),
  REFRESH_INTERVAL_SECONDS: positiveNumber(300),
  AGGREGATE_REFRESH_TIMEOUT_SECONDS: positiveNumber(120),

  ENABLE_REAL_TIME_EVENTS: booleanFlag(true),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  database: { connectionString: string; poolSize: number };
  /** Absent: the in-process memory cache is used. */
  redisUrl: string | null;
  queryTimeoutSeconds: number;
  refreshIntervalSeconds: number;
  aggregateRefreshTimeoutSeconds: number;
  enableRealTimeEvents: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${problems}`);
  }
  const vars = parsed.data;

  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    database: {
      connectionString: resolveConnectionString(vars),
      poolSize: vars.DB_POOL_SIZE,
    },
    redisUrl: vars.REDIS_URL ?? null,
    queryTimeoutSeconds: vars.QUERY_TIMEOUT_SECONDS,
    refreshIntervalSeconds: vars.REFRESH_INTERVAL_SECONDS,
    aggregateRefreshTimeoutSeconds: vars.AGGREGATE_REFRESH_TIMEOUT_SECONDS,
    enableRealTimeEvents: vars.ENABLE_REAL_TIME_EVENTS,
  };
}

// Prefer DATABASE_URL; otherwise POSTGRES_PASSWORD must be set explicitly (no default password)
function resolveConnectionString(vars: z.infer<typeof EnvSchema>): string {
  if (vars.DATABASE_URL) return vars.DATABASE_URL;

  if (!vars.POSTGRES_PASSWORD) {
    throw new Error(
      'Database connection requires either DATABASE_URL or POSTGRES_PASSWORD to be set. ' +
        'See .env.example for required configuration.'
    );
  }

  const user = encodeURIComponent(vars.POSTGRES_USER);
  const password = encodeURIComponent(vars.POSTGRES_PASSWORD);
  return `postgresql://${user}:${password}@${vars.POSTGRES_HOST}:${vars.POSTGRES_PORT}/${vars.POSTGRES_DATABASE}`;
}
