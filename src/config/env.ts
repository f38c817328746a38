import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DATABASE_PATH: z.string().trim().min(1).default('data/appointments.db'),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SEARCH_PAGE_SIZE: z.coerce.number().int().positive().max(100).default(20),
  IDEMPOTENCY_TTL_HOURS: z.coerce.number().positive().default(24),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse configuration from an environment map.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
