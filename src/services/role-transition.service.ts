/**
 * RoleTransitionService Implementation
 *
 * Purpose: Validate and execute changes to a user's role.
 * Owns: authz_user_roles
 * Dependencies: RoleGraphService, PermissionCache, AuditService,
 *               NotificationSink
 *
 * Rules:
 *   - nobody assigns a role at or above their own level, nor changes a user
 *     who already sits at or above it
 *   - only a top-level user may grant the top-level role
 *   - nobody raises their own level
 *   - once a user holds a role, moves follow the hierarchy: the new role
 *     must inherit from, or be inherited by, the current one
 *
 * Commit order: assignment -> cache invalidation -> audit entry, all under
 * the user's lock; the notification is dispatched afterwards and its
 * failure never rolls anything back.
 */

import type { UserLock } from '@/lib/user-lock.js';
import type {
  ActorContext,
  AuditLogEntry,
  MutationOptions,
  NotificationSink,
  RemoveRoleParams,
  Result,
  RoleChangeNotice,
  TransitionRoleParams,
  UserRoleAssignment,
} from '@/types/index.js';
import { success, failure, errorMessage } from '@/types/index.js';

import type { AuditService } from './audit.service.js';
import { runExclusive, userLockKey } from './mutation.js';
import type { PermissionCache } from './permission-cache.service.js';
import type { RoleGraphService } from './role-graph.service.js';

/**
 * Database abstraction interface for RoleTransitionService
 */
export interface RoleTransitionServiceDb {
  getAssignment: (userId: string) => Promise<UserRoleAssignment | null>;
  setAssignment: (
    assignment: UserRoleAssignment
  ) => Promise<UserRoleAssignment>;
}

export interface RoleTransition {
  userId: string;
  fromRole: string | null;
  toRole: string | null;
  assignment: UserRoleAssignment;
}

/**
 * RoleTransitionService interface
 */
export interface RoleTransitionService {
  transition(
    actor: ActorContext,
    params: TransitionRoleParams,
    options?: MutationOptions
  ): Promise<Result<RoleTransition>>;
  removeRole(
    actor: ActorContext,
    params: RemoveRoleParams,
    options?: MutationOptions
  ): Promise<Result<RoleTransition>>;
  getUserRole(userId: string): Promise<Result<string | null>>;
  listTransitions(userId: string): Promise<Result<AuditLogEntry[]>>;
}

/**
 * Create RoleTransitionService instance
 */
export function createRoleTransitionService(deps: {
  db: RoleTransitionServiceDb;
  roleGraph: RoleGraphService;
  cache: Pick<PermissionCache, 'invalidate'>;
  auditService: Pick<AuditService, 'record' | 'getTargetHistory'>;
  notifier: NotificationSink;
  lock: UserLock;
  now?: () => Date;
}): RoleTransitionService {
  const { db, roleGraph, cache, auditService, notifier, lock } = deps;
  const now = deps.now ?? ((): Date => new Date());

  /**
   * Authority of the actor over moving `targetUserId` from `fromRole` to `toRole`
   * toRole null means removal.
   */
  async function authorize(
    actor: ActorContext,
    targetUserId: string,
    fromRole: string | null,
    toRole: string | null
  ): Promise<Result<void>> {
    if (actor.type === 'system') {
      return success(undefined);
    }
    if (actor.userId === undefined) {
      return failure('INSUFFICIENT_AUTHORITY', 'Actor has no identity');
    }

    const actorRole =
      actor.userId === targetUserId
        ? fromRole
        : ((await db.getAssignment(actor.userId))?.roleId ?? null);
    const actorLevel = actorRole === null ? null : roleGraph.level(actorRole);
    if (actorRole === null || actorLevel === null) {
      return failure('INSUFFICIENT_AUTHORITY', 'Actor holds no role');
    }

    const fromLevel = fromRole === null ? null : roleGraph.level(fromRole);
    const toLevel = toRole === null ? null : roleGraph.level(toRole);
    const isSelf = actor.userId === targetUserId;

    if (isSelf && toLevel !== null && (fromLevel === null || toLevel > fromLevel)) {
      return failure('SELF_ESCALATION', 'Users cannot raise their own role', {
        fromRole,
        toRole,
      });
    }

    const actorIsTop = roleGraph.isTopRole(actorRole);
    if (toRole !== null && roleGraph.isTopRole(toRole) && !actorIsTop) {
      return failure(
        'INSUFFICIENT_AUTHORITY',
        `Only a ${roleGraph.topRole} may assign ${toRole}`
      );
    }
    if (fromRole !== null && roleGraph.isTopRole(fromRole) && !actorIsTop && !isSelf) {
      return failure(
        'INSUFFICIENT_AUTHORITY',
        `Only a ${roleGraph.topRole} may change a ${fromRole}`
      );
    }
    if (actorIsTop) {
      return success(undefined);
    }

    if (toLevel !== null && toLevel >= actorLevel) {
      return failure(
        'INSUFFICIENT_AUTHORITY',
        `Cannot assign ${toRole} (level ${toLevel}) from ${actorRole} (level ${actorLevel})`,
        { actorLevel, targetLevel: toLevel }
      );
    }
    if (!isSelf && fromLevel !== null && fromLevel >= actorLevel) {
      return failure(
        'INSUFFICIENT_AUTHORITY',
        `Cannot change a ${fromRole} (level ${fromLevel}) from ${actorRole} (level ${actorLevel})`,
        { actorLevel, currentLevel: fromLevel }
      );
    }
    return success(undefined);
  }

  function dispatchNotification(notice: RoleChangeNotice): void {
    void Promise.resolve()
      .then(() => notifier.notify(notice))
      .catch((err: unknown) => {
        console.error(
          `Role change notification failed for ${notice.userId} (${notice.oldRole ?? 'none'} -> ${notice.newRole ?? 'none'}):`,
          err
        );
      });
  }

  /**
   * Persist, invalidate, audit, then notify
   */
  async function commit(
    actor: ActorContext,
    targetUserId: string,
    fromRole: string | null,
    toRole: string | null,
    reason: string | undefined
  ): Promise<Result<RoleTransition>> {
    const assignment = await db.setAssignment({
      userId: targetUserId,
      roleId: toRole,
      assignedBy: actor.userId ?? null,
      assignedAt: now(),
    });
    await cache.invalidate(targetUserId);

    await auditService.record(actor, {
      action: toRole === null ? 'role:remove' : 'role:assign',
      target: { type: 'user', id: targetUserId },
      before: { role: fromRole },
      after: { role: toRole },
      ...(reason !== undefined && { reason }),
    });

    dispatchNotification({
      userId: targetUserId,
      oldRole: fromRole,
      newRole: toRole,
      actorId: actor.userId ?? null,
    });

    return success({ userId: targetUserId, fromRole, toRole, assignment });
  }

  return {
    /**
     * Move a user to `toRole`
     */
    async transition(
      actor: ActorContext,
      params: TransitionRoleParams,
      options?: MutationOptions
    ): Promise<Result<RoleTransition>> {
      const { targetUserId, toRole, reason } = params;
      if (roleGraph.getRole(toRole) === null) {
        return failure('UNKNOWN_TARGET_ROLE', `Role ${toRole} does not exist`);
      }

      return runExclusive(lock, userLockKey(targetUserId), options, async () => {
        const current = await db.getAssignment(targetUserId);
        // A role dropped from the graph counts as no role
        const fromRole =
          current?.roleId != null && roleGraph.getRole(current.roleId) !== null
            ? current.roleId
            : null;

        const allowed = await authorize(actor, targetUserId, fromRole, toRole);
        if (!allowed.success) {
          return allowed;
        }

        if (fromRole === toRole) {
          return failure('INVALID_TRANSITION', `User already holds ${toRole}`);
        }
        if (fromRole !== null && !roleGraph.areComparable(fromRole, toRole)) {
          return failure(
            'INVALID_TRANSITION',
            `${fromRole} and ${toRole} are not on one inheritance path`,
            { fromRole, toRole }
          );
        }

        return commit(actor, targetUserId, fromRole, toRole, reason);
      });
    },

    /**
     * Take the user's role away entirely
     */
    async removeRole(
      actor: ActorContext,
      params: RemoveRoleParams,
      options?: MutationOptions
    ): Promise<Result<RoleTransition>> {
      const { targetUserId, reason } = params;

      return runExclusive(lock, userLockKey(targetUserId), options, async () => {
        const current = await db.getAssignment(targetUserId);
        const fromRole = current?.roleId ?? null;
        if (fromRole === null) {
          return failure('NOT_FOUND', `User ${targetUserId} holds no role`);
        }

        const allowed = await authorize(actor, targetUserId, fromRole, null);
        if (!allowed.success) {
          return allowed;
        }

        return commit(actor, targetUserId, fromRole, null, reason);
      });
    },

    async getUserRole(userId: string): Promise<Result<string | null>> {
      try {
        const assignment = await db.getAssignment(userId);
        return success(assignment?.roleId ?? null);
      } catch (err) {
        return failure(
          'PERSISTENCE_ERROR',
          `Failed to load role of ${userId}: ${errorMessage(err)}`
        );
      }
    },

    /**
     * Role history of a user, read back from the audit trail
     */
    async listTransitions(userId: string): Promise<Result<AuditLogEntry[]>> {
      const history = await auditService.getTargetHistory('user', userId);
      if (!history.success) {
        return history;
      }
      return success(
        history.data.filter(
          (entry) => entry.action === 'role:assign' || entry.action === 'role:remove'
        )
      );
    },
  };
}
