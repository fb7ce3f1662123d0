/**
 * PermissionCache
 *
 * Memoises resolved permission sets per user. Explicit invalidation is the
 * correctness mechanism; the backend TTL only bounds the damage of a missed
 * invalidation.
 *
 * Every entry carries a stamp (generation, epoch, userVersion). The
 * generation is fresh per cache instance, so entries a previous process left
 * in Redis are never served. invalidate() bumps the user's version
 * in-process before touching the backend, invalidateAll() bumps the epoch.
 * An entry is served only when its stamp equals the current one, so a
 * resolution computed before a mutation can never be served after it, even
 * if its put() lands late.
 */

import { nanoid } from 'nanoid';

import type { CachedPermissions, CacheStamp } from '@/types/index.js';

/**
 * Key-value backend with TTL (Upstash Redis in production)
 */
export interface CacheBackend {
  get(key: string): Promise<CachedPermissions | null>;
  set(key: string, value: CachedPermissions, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
}

export interface PermissionCache {
  get(userId: string): Promise<CachedPermissions | null>;
  put(
    userId: string,
    codenames: Iterable<string>,
    stamp: CacheStamp,
    validUntil: number | null
  ): Promise<void>;
  /** Stamp to capture before computing a set that will be put() */
  stamp(userId: string): CacheStamp;
  invalidate(userId: string): Promise<void>;
  invalidateAll(): void;
}

export interface PermissionCacheOptions {
  backend: CacheBackend;
  ttlSeconds: number;
  keyPrefix?: string;
  /** Defaults to a random id per instance */
  generation?: string;
  now?: () => number;
}

function sameStamp(a: CacheStamp, b: CacheStamp): boolean {
  return (
    a.generation === b.generation &&
    a.epoch === b.epoch &&
    a.userVersion === b.userVersion
  );
}

export function createPermissionCache(
  options: PermissionCacheOptions
): PermissionCache {
  const { backend, ttlSeconds } = options;
  const keyPrefix = options.keyPrefix ?? 'authz:perms:';
  const now = options.now ?? Date.now;
  const generation = options.generation ?? nanoid();

  let epoch = 0;
  const userVersions = new Map<string, number>();

  const keyFor = (userId: string): string => `${keyPrefix}${userId}`;

  function currentStamp(userId: string): CacheStamp {
    return { generation, epoch, userVersion: userVersions.get(userId) ?? 0 };
  }

  return {
    async get(userId: string): Promise<CachedPermissions | null> {
      let entry: CachedPermissions | null;
      try {
        entry = await backend.get(keyFor(userId));
      } catch (err) {
        console.warn(
          `Permission cache unavailable, resolving ${userId} directly:`,
          err
        );
        return null;
      }

      if (entry === null || !sameStamp(entry.stamp, currentStamp(userId))) {
        return null;
      }
      if (entry.validUntil !== null && entry.validUntil <= now()) {
        return null;
      }
      return entry;
    },

    async put(
      userId: string,
      codenames: Iterable<string>,
      stamp: CacheStamp,
      validUntil: number | null
    ): Promise<void> {
      // Invalidated while the set was being computed
      if (!sameStamp(stamp, currentStamp(userId))) {
        return;
      }

      const value: CachedPermissions = {
        codenames: [...codenames].sort(),
        stamp,
        validUntil,
      };
      try {
        await backend.set(keyFor(userId), value, ttlSeconds);
      } catch (err) {
        console.warn(`Permission cache unavailable, skipping put for ${userId}:`, err);
      }
    },

    stamp(userId: string): CacheStamp {
      return currentStamp(userId);
    },

    async invalidate(userId: string): Promise<void> {
      userVersions.set(userId, (userVersions.get(userId) ?? 0) + 1);
      try {
        await backend.del(keyFor(userId));
      } catch (err) {
        // The version bump already makes the stored entry unreadable
        console.warn(`Permission cache delete failed for ${userId}:`, err);
      }
    },

    invalidateAll(): void {
      epoch += 1;
      userVersions.clear();
    },
  };
}
