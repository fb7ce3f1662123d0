/**
 * Policy State
 *
 * Owns the current PolicySnapshot. Built at startup, replaced wholesale on
 * structural mutation, never edited in place.
 */

import type {
  Permission,
  PolicySnapshot,
  Role,
  RolePermission,
} from '@/types/index.js';

export interface PolicySnapshotInput {
  roles: readonly Role[];
  permissions: readonly Permission[];
  rolePermissions: readonly RolePermission[];
}

export interface PolicyState {
  current(): PolicySnapshot;
  /**
   * Publish a new snapshot derived from the current one
   * Returns the published snapshot (version = previous + 1)
   */
  swap(next: Omit<PolicySnapshot, 'version'>): PolicySnapshot;
}

/**
 * Group role grants by role id
 */
function indexRolePermissions(
  rolePermissions: readonly RolePermission[]
): Map<string, Map<string, RolePermission>> {
  const byRole = new Map<string, Map<string, RolePermission>>();
  for (const grant of rolePermissions) {
    const grants = byRole.get(grant.roleId) ?? new Map<string, RolePermission>();
    grants.set(grant.codename, grant);
    byRole.set(grant.roleId, grants);
  }
  return byRole;
}

/**
 * Build a snapshot from flat lists (startup load, seeding, tests)
 */
export function buildPolicySnapshot(
  input: PolicySnapshotInput,
  version = 1
): PolicySnapshot {
  return {
    version,
    roles: new Map(input.roles.map((role) => [role.id, role] as const)),
    permissions: new Map(
      input.permissions.map((permission) => [permission.codename, permission] as const)
    ),
    rolePermissions: indexRolePermissions(input.rolePermissions),
  };
}

export function createPolicyState(
  initial: PolicySnapshot = buildPolicySnapshot({
    roles: [],
    permissions: [],
    rolePermissions: [],
  })
): PolicyState {
  let snapshot = initial;

  return {
    current(): PolicySnapshot {
      return snapshot;
    },

    swap(next: Omit<PolicySnapshot, 'version'>): PolicySnapshot {
      snapshot = { ...next, version: snapshot.version + 1 };
      return snapshot;
    },
  };
}

/**
 * Copy-on-write helpers for the nested grant map
 */
export function withRolePermission(
  rolePermissions: PolicySnapshot['rolePermissions'],
  grant: RolePermission
): Map<string, ReadonlyMap<string, RolePermission>> {
  const next = new Map<string, ReadonlyMap<string, RolePermission>>(
    rolePermissions
  );
  const grants = new Map<string, RolePermission>(
    rolePermissions.get(grant.roleId) ?? []
  );
  grants.set(grant.codename, grant);
  next.set(grant.roleId, grants);
  return next;
}
