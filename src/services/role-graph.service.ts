/**
 * RoleGraphService Implementation
 *
 * Purpose: Role hierarchy (inheritance DAG) and its closures.
 * Owns: authz_roles, authz_role_edges
 * Dependencies: AuditService, PermissionCache
 *
 * Reads go against the current PolicySnapshot without locking. Writes
 * validate against a proposed copy, persist, then swap the snapshot.
 */

import type { UserLock } from '@/lib/user-lock.js';
import type {
  ActorContext,
  AuditSnapshot,
  DefineRoleParams,
  PolicySnapshot,
  Result,
  Role,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

import type { AuditRecorder } from './audit.service.js';
import { POLICY_LOCK_KEY, runExclusive } from './mutation.js';
import type { PermissionCache } from './permission-cache.service.js';
import type { PolicyState } from './policy-state.js';

/**
 * Database abstraction interface for RoleGraphService
 */
export interface RoleGraphServiceDb {
  loadRoles: () => Promise<Role[]>;
  /** Node only; parents are written with insertEdge */
  insertRole: (role: Role) => Promise<void>;
  deleteRole: (roleId: string) => Promise<void>;
  insertEdge: (childId: string, parentId: string) => Promise<void>;
  deleteEdge: (childId: string, parentId: string) => Promise<void>;
}

/**
 * RoleGraphService interface
 */
export interface RoleGraphService {
  readonly topRole: string;
  closure(roleId: string): ReadonlySet<string>;
  level(roleId: string): number | null;
  getRole(roleId: string): Role | null;
  listRoles(): Role[];
  isTopRole(roleId: string | null): boolean;
  /** true when one role inherits (transitively) from the other */
  areComparable(a: string, b: string): boolean;
  defineRole(actor: ActorContext, params: DefineRoleParams): Promise<Result<Role>>;
  addEdge(
    actor: ActorContext,
    childId: string,
    parentId: string
  ): Promise<Result<Role>>;
  removeEdge(
    actor: ActorContext,
    childId: string,
    parentId: string
  ): Promise<Result<Role>>;
}

const EMPTY_CLOSURE: ReadonlySet<string> = new Set();

// Closures are memoised per snapshot; a swapped snapshot starts empty.
const closureMemo = new WeakMap<
  ReadonlyMap<string, Role>,
  Map<string, ReadonlySet<string>>
>();

/**
 * Role plus every transitively inherited ancestor
 */
export function closureOf(
  roles: ReadonlyMap<string, Role>,
  roleId: string
): ReadonlySet<string> {
  if (!roles.has(roleId)) {
    return EMPTY_CLOSURE;
  }

  let memo = closureMemo.get(roles);
  if (memo === undefined) {
    memo = new Map();
    closureMemo.set(roles, memo);
  }
  const cached = memo.get(roleId);
  if (cached !== undefined) {
    return cached;
  }

  const seen = new Set<string>();
  const stack = [roleId];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) {
      continue;
    }
    seen.add(id);
    for (const parent of roles.get(id)?.parents ?? []) {
      stack.push(parent);
    }
  }

  memo.set(roleId, seen);
  return seen;
}

/**
 * First cycle found by DFS, as a path of role ids, or null
 */
export function findCycle(roles: ReadonlyMap<string, Role>): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  function visit(id: string): string[] | null {
    const mark = state.get(id);
    if (mark === 'done') {
      return null;
    }
    if (mark === 'visiting') {
      return [...path.slice(path.indexOf(id)), id];
    }
    state.set(id, 'visiting');
    path.push(id);
    for (const parent of roles.get(id)?.parents ?? []) {
      const cycle = visit(parent);
      if (cycle !== null) {
        return cycle;
      }
    }
    path.pop();
    state.set(id, 'done');
    return null;
  }

  for (const id of roles.keys()) {
    const cycle = visit(id);
    if (cycle !== null) {
      return cycle;
    }
  }
  return null;
}

/**
 * Problems that make a role set unusable as a snapshot
 */
export function validateRoleGraph(roles: ReadonlyMap<string, Role>): string[] {
  const problems: string[] = [];
  const levels = new Map<number, string>();

  for (const role of roles.values()) {
    const holder = levels.get(role.level);
    if (holder !== undefined) {
      problems.push(`level ${role.level} claimed by both ${holder} and ${role.id}`);
    } else {
      levels.set(role.level, role.id);
    }
    for (const parent of role.parents) {
      if (!roles.has(parent)) {
        problems.push(`${role.id} inherits unknown role ${parent}`);
      }
    }
  }

  const cycle = findCycle(roles);
  if (cycle !== null) {
    problems.push(`inheritance cycle ${cycle.join(' -> ')}`);
  }
  return problems;
}

function roleSnapshot(role: Role): AuditSnapshot {
  return {
    id: role.id,
    name: role.name,
    level: role.level,
    parents: [...role.parents],
  };
}

/**
 * Create RoleGraphService instance
 */
export function createRoleGraphService(deps: {
  db: RoleGraphServiceDb;
  state: PolicyState;
  cache: Pick<PermissionCache, 'invalidateAll'>;
  auditService: AuditRecorder;
  lock: UserLock;
  topRole: string;
}): RoleGraphService {
  const { db, state, cache, auditService, lock, topRole } = deps;

  /**
   * Publish new roles, drop every cached permission set
   */
  function publishRoles(
    snapshot: PolicySnapshot,
    roles: Map<string, Role>
  ): void {
    state.swap({
      roles,
      permissions: snapshot.permissions,
      rolePermissions: snapshot.rolePermissions,
    });
    cache.invalidateAll();
  }

  return {
    topRole,

    closure(roleId: string): ReadonlySet<string> {
      return closureOf(state.current().roles, roleId);
    },

    level(roleId: string): number | null {
      return state.current().roles.get(roleId)?.level ?? null;
    },

    getRole(roleId: string): Role | null {
      return state.current().roles.get(roleId) ?? null;
    },

    listRoles(): Role[] {
      return [...state.current().roles.values()].sort(
        (a, b) => b.level - a.level
      );
    },

    isTopRole(roleId: string | null): boolean {
      if (roleId === null) {
        return false;
      }
      return closureOf(state.current().roles, roleId).has(topRole);
    },

    areComparable(a: string, b: string): boolean {
      const roles = state.current().roles;
      return closureOf(roles, a).has(b) || closureOf(roles, b).has(a);
    },

    /**
     * Add a new role node
     */
    async defineRole(
      actor: ActorContext,
      params: DefineRoleParams
    ): Promise<Result<Role>> {
      if (params.id.trim() === '' || !Number.isInteger(params.level)) {
        return failure(
          'VALIDATION_ERROR',
          'Role id must be non-empty and level an integer'
        );
      }

      return runExclusive(lock, POLICY_LOCK_KEY, undefined, async () => {
        const snapshot = state.current();
        if (snapshot.roles.has(params.id)) {
          return failure('DUPLICATE_ROLE', `Role ${params.id} already exists`);
        }
        const holder = [...snapshot.roles.values()].find(
          (role) => role.level === params.level
        );
        if (holder !== undefined) {
          return failure(
            'DUPLICATE_LEVEL',
            `Level ${params.level} is already held by ${holder.id}`,
            { level: params.level, roleId: holder.id }
          );
        }
        const parents = [...new Set(params.parents ?? [])];
        const missing = parents.find((parent) => !snapshot.roles.has(parent));
        if (missing !== undefined) {
          return failure('UNKNOWN_ROLE', `Parent role ${missing} does not exist`);
        }

        const role: Role = {
          id: params.id,
          name: params.name,
          level: params.level,
          parents,
        };
        await db.insertRole(role);
        try {
          for (const parentId of parents) {
            await db.insertEdge(role.id, parentId);
          }
        } catch (err) {
          // Leave no half-written role behind
          await db.deleteRole(role.id).catch((cleanupErr: unknown) => {
            console.error(`Failed to roll back role ${role.id}:`, cleanupErr);
          });
          throw err;
        }

        const roles = new Map(snapshot.roles);
        roles.set(role.id, role);
        publishRoles(snapshot, roles);

        await auditService.record(actor, {
          action: 'role:define',
          target: { type: 'role', id: role.id },
          before: null,
          after: roleSnapshot(role),
        });
        return success(role);
      });
    },

    /**
     * Make `childId` inherit from `parentId`
     * Rejects any edge that would close a cycle; the graph stays unchanged.
     */
    async addEdge(
      actor: ActorContext,
      childId: string,
      parentId: string
    ): Promise<Result<Role>> {
      return runExclusive(lock, POLICY_LOCK_KEY, undefined, async () => {
        const snapshot = state.current();
        const child = snapshot.roles.get(childId);
        if (child === undefined || !snapshot.roles.has(parentId)) {
          return failure(
            'UNKNOWN_ROLE',
            `Unknown role ${child === undefined ? childId : parentId}`
          );
        }
        if (child.parents.includes(parentId)) {
          return success(child);
        }

        const updated: Role = { ...child, parents: [...child.parents, parentId] };
        const proposed = new Map(snapshot.roles);
        proposed.set(childId, updated);

        const cycle = findCycle(proposed);
        if (cycle !== null) {
          return failure(
            'CYCLE_DETECTED',
            `Edge ${childId} -> ${parentId} would create a cycle`,
            { cycle }
          );
        }

        await db.insertEdge(childId, parentId);
        publishRoles(snapshot, proposed);

        await auditService.record(actor, {
          action: 'role_edge:add',
          target: { type: 'role', id: childId },
          before: roleSnapshot(child),
          after: roleSnapshot(updated),
        });
        return success(updated);
      });
    },

    /**
     * Drop the inheritance edge `childId` -> `parentId`
     */
    async removeEdge(
      actor: ActorContext,
      childId: string,
      parentId: string
    ): Promise<Result<Role>> {
      return runExclusive(lock, POLICY_LOCK_KEY, undefined, async () => {
        const snapshot = state.current();
        const child = snapshot.roles.get(childId);
        if (child === undefined || !snapshot.roles.has(parentId)) {
          return failure(
            'UNKNOWN_ROLE',
            `Unknown role ${child === undefined ? childId : parentId}`
          );
        }
        if (!child.parents.includes(parentId)) {
          return failure(
            'NOT_FOUND',
            `${childId} does not inherit directly from ${parentId}`
          );
        }

        const updated: Role = {
          ...child,
          parents: child.parents.filter((parent) => parent !== parentId),
        };
        await db.deleteEdge(childId, parentId);

        const roles = new Map(snapshot.roles);
        roles.set(childId, updated);
        publishRoles(snapshot, roles);

        await auditService.record(actor, {
          action: 'role_edge:remove',
          target: { type: 'role', id: childId },
          before: roleSnapshot(child),
          after: roleSnapshot(updated),
        });
        return success(updated);
      });
    },
  };
}
