/**
 * PermissionCatalogService Implementation
 *
 * Purpose: Registry of permission codenames and the default role grants.
 * Owns: authz_permissions, authz_role_permissions
 * Dependencies: AuditService, PermissionCache
 *
 * Lookups hit the snapshot's Map (O(1)); nothing is scanned per resolution.
 */

import type { UserLock } from '@/lib/user-lock.js';
import type {
  ActorContext,
  AuditSnapshot,
  Permission,
  PolicySnapshot,
  RegisterPermissionParams,
  Result,
  RolePermission,
  SetRolePermissionParams,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

import type { AuditRecorder } from './audit.service.js';
import { POLICY_LOCK_KEY, runExclusive } from './mutation.js';
import type { PermissionCache } from './permission-cache.service.js';
import { withRolePermission, type PolicyState } from './policy-state.js';

/**
 * Database abstraction interface for PermissionCatalogService
 */
export interface PermissionCatalogServiceDb {
  loadPermissions: () => Promise<Permission[]>;
  loadRolePermissions: () => Promise<RolePermission[]>;
  insertPermission: (permission: Permission) => Promise<void>;
  updatePermissionActive: (codename: string, active: boolean) => Promise<void>;
  upsertRolePermission: (grant: RolePermission) => Promise<void>;
}

/**
 * PermissionCatalogService interface
 */
export interface PermissionCatalogService {
  get(codename: string): Permission | null;
  isRegistered(codename: string): boolean;
  listAll(): Permission[];
  listActive(): Permission[];
  listByCategory(category: string): Permission[];
  listRolePermissions(roleId: string): RolePermission[];
  register(
    actor: ActorContext,
    params: RegisterPermissionParams
  ): Promise<Result<Permission>>;
  setActive(
    actor: ActorContext,
    codename: string,
    active: boolean
  ): Promise<Result<Permission>>;
  setRolePermission(
    actor: ActorContext,
    params: SetRolePermissionParams
  ): Promise<Result<RolePermission>>;
}

export const CODENAME_PATTERN = /^[a-z][a-z0-9_:.-]*$/;

function permissionSnapshot(permission: Permission): AuditSnapshot {
  return {
    codename: permission.codename,
    name: permission.name,
    category: permission.category,
    active: permission.active,
  };
}

function grantSnapshot(grant: RolePermission): AuditSnapshot {
  return {
    roleId: grant.roleId,
    codename: grant.codename,
    active: grant.active,
    canDelegate: grant.canDelegate,
  };
}

/**
 * Human label derived from a codename: view_audit_logs -> View Audit Logs
 */
function labelFor(codename: string): string {
  return codename
    .split(/[_:.-]+/)
    .filter((part) => part !== '')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

function byCategoryThenCodename(a: Permission, b: Permission): number {
  return (
    a.category.localeCompare(b.category) || a.codename.localeCompare(b.codename)
  );
}

/**
 * Create PermissionCatalogService instance
 */
export function createPermissionCatalogService(deps: {
  db: PermissionCatalogServiceDb;
  state: PolicyState;
  cache: Pick<PermissionCache, 'invalidateAll'>;
  auditService: AuditRecorder;
  lock: UserLock;
  now?: () => Date;
}): PermissionCatalogService {
  const { db, state, cache, auditService, lock } = deps;
  const now = deps.now ?? ((): Date => new Date());

  function publishPermissions(
    snapshot: PolicySnapshot,
    permissions: Map<string, Permission>
  ): void {
    state.swap({
      roles: snapshot.roles,
      permissions,
      rolePermissions: snapshot.rolePermissions,
    });
    cache.invalidateAll();
  }

  return {
    get(codename: string): Permission | null {
      return state.current().permissions.get(codename) ?? null;
    },

    isRegistered(codename: string): boolean {
      return state.current().permissions.has(codename);
    },

    listAll(): Permission[] {
      return [...state.current().permissions.values()].sort(
        byCategoryThenCodename
      );
    },

    listActive(): Permission[] {
      return this.listAll().filter((permission) => permission.active);
    },

    listByCategory(category: string): Permission[] {
      return this.listAll().filter(
        (permission) => permission.category === category
      );
    },

    listRolePermissions(roleId: string): RolePermission[] {
      const grants = state.current().rolePermissions.get(roleId);
      if (grants === undefined) {
        return [];
      }
      return [...grants.values()].sort((a, b) =>
        a.codename.localeCompare(b.codename)
      );
    },

    /**
     * Register a new codename (seeded or created at runtime)
     */
    async register(
      actor: ActorContext,
      params: RegisterPermissionParams
    ): Promise<Result<Permission>> {
      if (!CODENAME_PATTERN.test(params.codename)) {
        return failure(
          'VALIDATION_ERROR',
          `Invalid codename "${params.codename}"`,
          { pattern: CODENAME_PATTERN.source }
        );
      }
      if (params.category.trim() === '') {
        return failure('VALIDATION_ERROR', 'Category is required');
      }

      return runExclusive(lock, POLICY_LOCK_KEY, undefined, async () => {
        const snapshot = state.current();
        if (snapshot.permissions.has(params.codename)) {
          return failure(
            'DUPLICATE_CODENAME',
            `Permission ${params.codename} is already registered`
          );
        }

        const permission: Permission = {
          codename: params.codename,
          name: params.name ?? labelFor(params.codename),
          description: params.description,
          category: params.category,
          active: true,
          builtIn: params.builtIn ?? false,
          createdAt: now(),
        };
        await db.insertPermission(permission);

        const permissions = new Map(snapshot.permissions);
        permissions.set(permission.codename, permission);
        publishPermissions(snapshot, permissions);

        await auditService.record(actor, {
          action: 'permission:register',
          target: { type: 'permission', id: permission.codename },
          before: null,
          after: permissionSnapshot(permission),
        });
        return success(permission);
      });
    },

    /**
     * Activate or deactivate a codename for everyone
     */
    async setActive(
      actor: ActorContext,
      codename: string,
      active: boolean
    ): Promise<Result<Permission>> {
      return runExclusive(lock, POLICY_LOCK_KEY, undefined, async () => {
        const snapshot = state.current();
        const existing = snapshot.permissions.get(codename);
        if (existing === undefined) {
          return failure(
            'UNKNOWN_PERMISSION',
            `Permission ${codename} is not registered`
          );
        }
        if (existing.active === active) {
          return success(existing);
        }

        const updated: Permission = { ...existing, active };
        await db.updatePermissionActive(codename, active);

        const permissions = new Map(snapshot.permissions);
        permissions.set(codename, updated);
        publishPermissions(snapshot, permissions);

        await auditService.record(actor, {
          action: 'permission:set_active',
          target: { type: 'permission', id: codename },
          before: permissionSnapshot(existing),
          after: permissionSnapshot(updated),
        });
        return success(updated);
      });
    },

    /**
     * Create or toggle the default grant of a permission to a role
     */
    async setRolePermission(
      actor: ActorContext,
      params: SetRolePermissionParams
    ): Promise<Result<RolePermission>> {
      return runExclusive(lock, POLICY_LOCK_KEY, undefined, async () => {
        const snapshot = state.current();
        if (!snapshot.roles.has(params.roleId)) {
          return failure('UNKNOWN_ROLE', `Role ${params.roleId} does not exist`);
        }
        if (!snapshot.permissions.has(params.codename)) {
          return failure(
            'UNKNOWN_PERMISSION',
            `Permission ${params.codename} is not registered`
          );
        }

        const existing =
          snapshot.rolePermissions.get(params.roleId)?.get(params.codename) ??
          null;
        const grant: RolePermission = {
          roleId: params.roleId,
          codename: params.codename,
          active: params.active,
          canDelegate: params.canDelegate ?? existing?.canDelegate ?? false,
        };
        if (
          existing !== null &&
          existing.active === grant.active &&
          existing.canDelegate === grant.canDelegate
        ) {
          return success(existing);
        }

        await db.upsertRolePermission(grant);
        state.swap({
          roles: snapshot.roles,
          permissions: snapshot.permissions,
          rolePermissions: withRolePermission(snapshot.rolePermissions, grant),
        });
        cache.invalidateAll();

        await auditService.record(actor, {
          action: 'role_permission:set',
          target: {
            type: 'role_permission',
            id: `${params.roleId}:${params.codename}`,
          },
          before: existing === null ? null : grantSnapshot(existing),
          after: grantSnapshot(grant),
        });
        return success(grant);
      });
    },
  };
}
