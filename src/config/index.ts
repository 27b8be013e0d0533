import 'dotenv/config';
import { z } from 'zod';
import type { EnvConfig } from '../types';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().positive().default(20),
  VARIANCE_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  COLLISION_POLICY: z.enum(['sum', 'reject']).default('sum'),
});

/**
 * Parse and validate environment variables.
 * Fails fast so a misconfigured process never starts serving.
 */
const loadEnv = (): EnvConfig => {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
};

export const env: EnvConfig = loadEnv();

export default env;
