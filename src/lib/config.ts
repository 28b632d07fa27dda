/**
 * Application Configuration
 * Parses environment variables into a typed config
 */

import { z } from 'zod';

import type { Result } from '../types/index.js';
import { failure, success } from '../types/index.js';

const envSchema = z.object({
  SUPABASE_URL: z.string().url('SUPABASE_URL must be a URL'),
  SUPABASE_SERVICE_KEY: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),
  PORT: z.coerce.number().int().positive().default(3000),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  LOG_REQUESTS: z.enum(['true', 'false']).default('true'),
});

export interface AppConfig {
  supabaseUrl: string;
  supabaseServiceKey: string;
  port: number;
  bcryptRounds: number;
  allowedOrigins: string[];
  logRequests: boolean;
}

/**
 * Load config from an environment map (process.env by default)
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return failure('CONFIG_ERROR', `Invalid configuration - ${problems}`);
  }

  const values = parsed.data;
  return success({
    supabaseUrl: values.SUPABASE_URL,
    supabaseServiceKey: values.SUPABASE_SERVICE_KEY,
    port: values.PORT,
    bcryptRounds: values.BCRYPT_ROUNDS,
    allowedOrigins: values.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    logRequests: values.LOG_REQUESTS === 'true',
  });
}
