import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export type AppLogLevel = typeof LOG_LEVELS[number];

const EnvSchema = z.object({
  WEATHER_API_URL: z
    .string()
    .url()
    .default('https://api.open-meteo.com/v1/forecast'),
  WEATHER_API_KEY: z.string().min(1).optional(),
  WEATHER_TEMPERATURE_UNIT: z.enum(['fahrenheit', 'celsius']).default('fahrenheit'),
  // Open-Meteo rejects more than 1000 coordinates in one request
  WEATHER_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(1000),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  WEATHER_RETRY_COUNT: z.coerce.number().int().min(0).max(5).default(3),
  WEATHER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(200),
  WEATHER_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(600),
  DEFAULT_RADIUS_MILES: z.coerce.number().positive().default(10),
  // unset: use the national table bundled with the zipcodes package
  ZIP_DATASET_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * Validates the raw environment for ConfigModule.forRoot({ validate }).
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const cleaned = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return parsed.data;
}

/**
 * Nest enables a level together with every level above it.
 */
export function resolveLogLevels(level: string | undefined): AppLogLevel[] {
  const parsed = z.enum(LOG_LEVELS).safeParse(level);
  const threshold = parsed.success ? parsed.data : 'warn';
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}
