/**
 * In-process cache backend
 * Used when no Redis is configured and in tests
 */

import type { CacheBackend } from '@/services/permission-cache.service.js';
import type { CachedPermissions } from '@/types/index.js';

interface MemoryEntry {
  value: CachedPermissions;
  expiresAt: number;
}

export function createMemoryCacheBackend(
  now: () => number = Date.now
): CacheBackend & { size(): number } {
  const entries = new Map<string, MemoryEntry>();

  return {
    get(key: string): Promise<CachedPermissions | null> {
      const entry = entries.get(key);
      if (entry === undefined) {
        return Promise.resolve(null);
      }
      if (entry.expiresAt <= now()) {
        entries.delete(key);
        return Promise.resolve(null);
      }
      return Promise.resolve(entry.value);
    },

    set(
      key: string,
      value: CachedPermissions,
      ttlSeconds: number
    ): Promise<void> {
      entries.set(key, { value, expiresAt: now() + ttlSeconds * 1000 });
      return Promise.resolve();
    },

    del(key: string): Promise<void> {
      entries.delete(key);
      return Promise.resolve();
    },

    size(): number {
      return entries.size;
    },
  };
}
