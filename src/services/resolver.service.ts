/**
 * ResolverService Implementation
 *
 * Purpose: Allow/deny decision for (user, permission).
 * Owns: nothing - reads the policy snapshot and per-user state, writes
 *       cache entries only.
 *
 * Precedence, first match wins:
 *   1. unregistered codename          -> deny (fail closed, never throws)
 *   2. role closure holds the top role -> allow
 *   3. live deny override             -> deny
 *   4. live grant override            -> allow
 *   5. active permission granted by an active RolePermission of any role
 *      in the closure                 -> allow
 *   6. otherwise                      -> deny
 */

import type { Override, PolicySnapshot } from '@/types/index.js';

import { isOverrideActive } from './override.service.js';
import type { PermissionCache } from './permission-cache.service.js';
import type { PolicyState } from './policy-state.js';
import { closureOf } from './role-graph.service.js';

/**
 * Per-user reads the resolver needs from the store
 */
export interface ResolverServiceDb {
  getUserRole: (userId: string) => Promise<string | null>;
  listOverrides: (userId: string) => Promise<Override[]>;
}

/**
 * ResolverService interface
 */
export interface ResolverService {
  resolve(userId: string, codename: string): Promise<boolean>;
  resolveAll(userId: string): Promise<ReadonlySet<string>>;
  resolveMany(
    userId: string,
    codenames: readonly string[]
  ): Promise<Record<string, boolean>>;
  hasAll(userId: string, codenames: readonly string[]): Promise<boolean>;
  hasAny(userId: string, codenames: readonly string[]): Promise<boolean>;
}

export interface EffectivePermissions {
  codenames: Set<string>;
  /** earliest expiry among applied overrides (epoch ms), null if none */
  validUntil: number | null;
}

/**
 * Effective permission set of one user against one snapshot
 * Pure: the same inputs always give the same set.
 */
export function computeEffectivePermissions(input: {
  snapshot: PolicySnapshot;
  roleId: string | null;
  topRole: string;
  overrides: readonly Override[];
  now: number;
}): EffectivePermissions {
  const { snapshot, roleId, topRole, overrides, now } = input;
  const closure =
    roleId === null ? new Set<string>() : closureOf(snapshot.roles, roleId);

  if (closure.has(topRole)) {
    return { codenames: new Set(snapshot.permissions.keys()), validUntil: null };
  }

  const codenames = new Set<string>();
  for (const id of closure) {
    for (const grant of snapshot.rolePermissions.get(id)?.values() ?? []) {
      if (grant.active && snapshot.permissions.get(grant.codename)?.active === true) {
        codenames.add(grant.codename);
      }
    }
  }

  const denied = new Set<string>();
  let validUntil: number | null = null;
  for (const override of overrides) {
    if (!isOverrideActive(override, now)) {
      continue;
    }
    if (!snapshot.permissions.has(override.codename)) {
      continue;
    }
    if (override.expiresAt !== null) {
      const expiry = override.expiresAt.getTime();
      validUntil = validUntil === null ? expiry : Math.min(validUntil, expiry);
    }
    if (override.polarity === 'deny') {
      denied.add(override.codename);
    } else {
      codenames.add(override.codename);
    }
  }

  // Deny wins over every grant, explicit or inherited
  for (const codename of denied) {
    codenames.delete(codename);
  }

  return { codenames, validUntil };
}

/**
 * Create ResolverService instance
 */
export function createResolverService(deps: {
  db: ResolverServiceDb;
  state: PolicyState;
  cache: PermissionCache;
  topRole: string;
  now?: () => number;
}): ResolverService {
  const { db, state, cache, topRole } = deps;
  const now = deps.now ?? Date.now;

  async function computeAndCache(userId: string): Promise<ReadonlySet<string>> {
    // Captured first: a mutation landing after this point voids the put
    const stamp = cache.stamp(userId);
    const snapshot = state.current();

    const [roleId, overrides] = await Promise.all([
      db.getUserRole(userId),
      db.listOverrides(userId),
    ]);
    const effective = computeEffectivePermissions({
      snapshot,
      roleId,
      topRole,
      overrides,
      now: now(),
    });

    await cache.put(userId, effective.codenames, stamp, effective.validUntil);
    return effective.codenames;
  }

  return {
    /**
     * Check one permission
     * Unknown codenames and store failures resolve to false.
     */
    async resolve(userId: string, codename: string): Promise<boolean> {
      if (!state.current().permissions.has(codename)) {
        console.warn(
          `Permission check for unregistered codename "${codename}" denied (user ${userId})`
        );
        return false;
      }
      const effective = await this.resolveAll(userId);
      return effective.has(codename);
    },

    /**
     * Full effective permission set; this is what the cache holds
     */
    async resolveAll(userId: string): Promise<ReadonlySet<string>> {
      const cached = await cache.get(userId);
      if (cached !== null) {
        return new Set(cached.codenames);
      }

      try {
        return await computeAndCache(userId);
      } catch (err) {
        console.error(`Permission resolution failed for ${userId}, denying:`, err);
        return new Set();
      }
    },

    /**
     * Batch check, e.g. the gates of one page render
     */
    async resolveMany(
      userId: string,
      codenames: readonly string[]
    ): Promise<Record<string, boolean>> {
      const snapshot = state.current();
      const effective = await this.resolveAll(userId);
      const decisions: Record<string, boolean> = {};
      for (const codename of codenames) {
        decisions[codename] =
          snapshot.permissions.has(codename) && effective.has(codename);
      }
      return decisions;
    },

    async hasAll(userId: string, codenames: readonly string[]): Promise<boolean> {
      if (codenames.length === 0) {
        return true;
      }
      const decisions = await this.resolveMany(userId, codenames);
      return codenames.every((codename) => decisions[codename] === true);
    },

    async hasAny(userId: string, codenames: readonly string[]): Promise<boolean> {
      if (codenames.length === 0) {
        return false;
      }
      const decisions = await this.resolveMany(userId, codenames);
      return codenames.some((codename) => decisions[codename] === true);
    },
  };
}
