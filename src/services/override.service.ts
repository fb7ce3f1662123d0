/**
 * OverrideService Implementation
 *
 * Purpose: Per-user grants and denials that outrank role-derived grants.
 * Owns: authz_overrides
 * Dependencies: AuditService, PermissionCache, PermissionCatalog (snapshot)
 *
 * Expiry is lazy: an override whose expiresAt has passed is simply ignored
 * by every read. There is no background sweeper.
 */

import { nanoid } from 'nanoid';

import type { UserLock } from '@/lib/user-lock.js';
import type {
  ActorContext,
  AuditSnapshot,
  CreateOverrideParams,
  MutationOptions,
  Override,
  OverridePolarity,
  RemoveOverrideParams,
  Result,
} from '@/types/index.js';
import { success, failure, errorMessage } from '@/types/index.js';

import type { AuditRecorder } from './audit.service.js';
import { runExclusive, userLockKey } from './mutation.js';
import type { PermissionCache } from './permission-cache.service.js';
import type { PolicyState } from './policy-state.js';

/**
 * Database abstraction interface for OverrideService
 * (userId, codename, polarity) is unique
 */
export interface OverrideServiceDb {
  listForUser: (userId: string) => Promise<Override[]>;
  getById: (overrideId: string) => Promise<Override | null>;
  upsert: (override: Override) => Promise<Override>;
  delete: (overrideId: string) => Promise<boolean>;
  setExpiry: (overrideId: string, expiresAt: Date) => Promise<Override | null>;
}

/**
 * OverrideService interface
 */
export interface OverrideService {
  grant(
    actor: ActorContext,
    params: CreateOverrideParams,
    options?: MutationOptions
  ): Promise<Result<Override>>;
  deny(
    actor: ActorContext,
    params: CreateOverrideParams,
    options?: MutationOptions
  ): Promise<Result<Override>>;
  remove(
    actor: ActorContext,
    params: RemoveOverrideParams,
    options?: MutationOptions
  ): Promise<Result<void>>;
  expire(
    actor: ActorContext,
    overrideId: string,
    options?: MutationOptions
  ): Promise<Result<Override>>;
  listForUser(
    userId: string,
    params?: { includeExpired?: boolean }
  ): Promise<Result<Override[]>>;
}

/**
 * Whether an override still applies at `now`
 */
export function isOverrideActive(override: Override, now: number): boolean {
  return override.expiresAt === null || override.expiresAt.getTime() > now;
}

function overrideSnapshot(override: Override): AuditSnapshot {
  return {
    id: override.id,
    userId: override.userId,
    codename: override.codename,
    polarity: override.polarity,
    reason: override.reason,
    expiresAt: override.expiresAt?.toISOString() ?? null,
  };
}

/**
 * Create OverrideService instance
 */
export function createOverrideService(deps: {
  db: OverrideServiceDb;
  state: PolicyState;
  cache: Pick<PermissionCache, 'invalidate'>;
  auditService: AuditRecorder;
  lock: UserLock;
  now?: () => Date;
}): OverrideService {
  const { db, state, cache, auditService, lock } = deps;
  const now = deps.now ?? ((): Date => new Date());

  async function create(
    actor: ActorContext,
    polarity: OverridePolarity,
    params: CreateOverrideParams,
    options: MutationOptions | undefined
  ): Promise<Result<Override>> {
    if (!state.current().permissions.has(params.codename)) {
      return failure(
        'UNKNOWN_PERMISSION',
        `Permission ${params.codename} is not registered`
      );
    }
    if (params.reason.trim() === '') {
      return failure('VALIDATION_ERROR', 'A reason is required for overrides');
    }
    const expiresAt = params.expiresAt ?? null;
    if (expiresAt !== null && expiresAt.getTime() <= now().getTime()) {
      return failure('VALIDATION_ERROR', 'Expiry must be in the future');
    }

    return runExclusive(lock, userLockKey(params.userId), options, async () => {
      const existing =
        (await db.listForUser(params.userId)).find(
          (override) =>
            override.codename === params.codename &&
            override.polarity === polarity
        ) ?? null;

      const saved = await db.upsert({
        id: existing?.id ?? nanoid(),
        userId: params.userId,
        codename: params.codename,
        polarity,
        reason: params.reason,
        expiresAt,
        createdBy: actor.userId ?? null,
        createdAt: now(),
      });
      await cache.invalidate(params.userId);

      await auditService.record(actor, {
        action: 'override:create',
        target: { type: 'override', id: saved.id },
        before: existing === null ? null : overrideSnapshot(existing),
        after: overrideSnapshot(saved),
        reason: params.reason,
      });
      return success(saved);
    });
  }

  return {
    grant(actor, params, options) {
      return create(actor, 'grant', params, options);
    },

    deny(actor, params, options) {
      return create(actor, 'deny', params, options);
    },

    /**
     * Delete the override for (user, codename, polarity)
     */
    async remove(
      actor: ActorContext,
      params: RemoveOverrideParams,
      options?: MutationOptions
    ): Promise<Result<void>> {
      return runExclusive(lock, userLockKey(params.userId), options, async () => {
        const existing = (await db.listForUser(params.userId)).find(
          (override) =>
            override.codename === params.codename &&
            override.polarity === params.polarity
        );
        if (existing === undefined) {
          return failure(
            'NOT_FOUND',
            `No ${params.polarity} override on ${params.codename} for ${params.userId}`
          );
        }

        await db.delete(existing.id);
        await cache.invalidate(params.userId);

        await auditService.record(actor, {
          action: 'override:remove',
          target: { type: 'override', id: existing.id },
          before: overrideSnapshot(existing),
          after: null,
        });
        return success(undefined);
      });
    },

    /**
     * End an override now; it stays on record as expired
     */
    async expire(
      actor: ActorContext,
      overrideId: string,
      options?: MutationOptions
    ): Promise<Result<Override>> {
      let target: Override | null;
      try {
        target = await db.getById(overrideId);
      } catch (err) {
        return failure(
          'PERSISTENCE_ERROR',
          `Failed to load override: ${errorMessage(err)}`
        );
      }
      if (target === null) {
        return failure('NOT_FOUND', `Override ${overrideId} not found`);
      }
      const userId = target.userId;

      return runExclusive(lock, userLockKey(userId), options, async () => {
        const current = await db.getById(overrideId);
        if (current === null) {
          return failure('NOT_FOUND', `Override ${overrideId} not found`);
        }
        const at = now();
        if (!isOverrideActive(current, at.getTime())) {
          return failure('VALIDATION_ERROR', `Override ${overrideId} has already expired`);
        }

        const expired = await db.setExpiry(overrideId, at);
        if (expired === null) {
          return failure('NOT_FOUND', `Override ${overrideId} not found`);
        }
        await cache.invalidate(userId);

        await auditService.record(actor, {
          action: 'override:expire',
          target: { type: 'override', id: overrideId },
          before: overrideSnapshot(current),
          after: overrideSnapshot(expired),
        });
        return success(expired);
      });
    },

    async listForUser(
      userId: string,
      params: { includeExpired?: boolean } = {}
    ): Promise<Result<Override[]>> {
      try {
        const overrides = await db.listForUser(userId);
        const at = now().getTime();
        return success(
          params.includeExpired === true
            ? overrides
            : overrides.filter((override) => isOverrideActive(override, at))
        );
      } catch (err) {
        return failure(
          'PERSISTENCE_ERROR',
          `Failed to list overrides: ${errorMessage(err)}`
        );
      }
    },
  };
}
