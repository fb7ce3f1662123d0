/**
 * Upstash Redis Cache Backend
 * Stores resolved permission sets with a TTL backstop
 */

import { Redis } from '@upstash/redis';
import { z } from 'zod';

import type { CacheBackend } from '@/services/permission-cache.service.js';
import type { CachedPermissions } from '@/types/index.js';

const cachedPermissionsSchema = z.object({
  codenames: z.array(z.string()),
  stamp: z.object({
    generation: z.string(),
    epoch: z.number().int(),
    userVersion: z.number().int(),
  }),
  validUntil: z.number().nullable(),
});

/**
 * Create the Redis client
 */
export function createRedis(config: { url: string; token: string }): Redis {
  return new Redis({
    url: config.url,
    token: config.token,
  });
}

/**
 * Wrap a Redis client as a permission cache backend
 * Values that do not match the cached shape are treated as misses.
 */
export function createRedisCacheBackend(redis: Redis): CacheBackend {
  return {
    async get(key: string): Promise<CachedPermissions | null> {
      const value = await redis.get<unknown>(key);
      if (value === null) {
        return null;
      }
      const parsed = cachedPermissionsSchema.safeParse(value);
      return parsed.success ? parsed.data : null;
    },

    async set(
      key: string,
      value: CachedPermissions,
      ttlSeconds: number
    ): Promise<void> {
      await redis.set(key, value, { ex: ttlSeconds });
    },

    async del(key: string): Promise<void> {
      await redis.del(key);
    },
  };
}
