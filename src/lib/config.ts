/**
 * Environment Configuration
 * Parsed once at startup; invalid values stop the process before it serves.
 */

import { z } from 'zod';

const emptyAsUndefined = (value: unknown): unknown =>
  value === '' ? undefined : value;

const envSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),
  UPSTASH_REDIS_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  UPSTASH_REDIS_TOKEN: z.preprocess(
    emptyAsUndefined,
    z.string().min(1).optional()
  ),
  AUTHZ_TOP_ROLE: z.string().min(1).default('superuser'),
  AUTHZ_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  AUDIT_MAX_RETRIES: z.coerce.number().int().positive().default(5),
  AUDIT_RETRY_INTERVAL_MS: z.coerce.number().int().positive().default(10000),
  LOCK_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
  PORT: z.coerce.number().int().positive().default(3000),
});

export interface AppConfig {
  supabase: { url: string; serviceKey: string };
  redis: { url: string; token: string } | null;
  authz: {
    topRole: string;
    cacheTtlSeconds: number;
    lockTimeoutMs: number;
  };
  audit: {
    maxRetries: number;
    retryIntervalMs: number;
  };
  port: number;
}

/**
 * Parse environment variables into AppConfig
 * Throws with every invalid variable listed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  const redis =
    vars.UPSTASH_REDIS_URL !== undefined &&
    vars.UPSTASH_REDIS_TOKEN !== undefined
      ? { url: vars.UPSTASH_REDIS_URL, token: vars.UPSTASH_REDIS_TOKEN }
      : null;

  return {
    supabase: { url: vars.SUPABASE_URL, serviceKey: vars.SUPABASE_SERVICE_KEY },
    redis,
    authz: {
      topRole: vars.AUTHZ_TOP_ROLE,
      cacheTtlSeconds: vars.AUTHZ_CACHE_TTL_SECONDS,
      lockTimeoutMs: vars.LOCK_TIMEOUT_MS,
    },
    audit: {
      maxRetries: vars.AUDIT_MAX_RETRIES,
      retryIntervalMs: vars.AUDIT_RETRY_INTERVAL_MS,
    },
    port: vars.PORT,
  };
}
