/**
 * Bootstrap
 *
 * Startup load of the policy snapshot and idempotent seeding of the role
 * hierarchy, permission catalog and default role grants.
 */

import { z } from 'zod';

import type { ActorContext, PolicySnapshot, Result } from '@/types/index.js';
import { success, failure, SYSTEM_ACTOR } from '@/types/index.js';

import type {
  PermissionCatalogService,
  PermissionCatalogServiceDb,
} from './permission-catalog.service.js';
import { buildPolicySnapshot } from './policy-state.js';
import type { RoleGraphService, RoleGraphServiceDb } from './role-graph.service.js';
import { validateRoleGraph } from './role-graph.service.js';

/**
 * Read roles, edges, permissions and role grants into a snapshot
 * Throws when the stored role graph is unusable; the server must not start.
 */
export async function loadPolicySnapshot(deps: {
  roleGraphDb: Pick<RoleGraphServiceDb, 'loadRoles'>;
  catalogDb: Pick<PermissionCatalogServiceDb, 'loadPermissions' | 'loadRolePermissions'>;
}): Promise<PolicySnapshot> {
  const [roles, permissions, rolePermissions] = await Promise.all([
    deps.roleGraphDb.loadRoles(),
    deps.catalogDb.loadPermissions(),
    deps.catalogDb.loadRolePermissions(),
  ]);

  const snapshot = buildPolicySnapshot({ roles, permissions, rolePermissions });
  const problems = validateRoleGraph(snapshot.roles);
  if (problems.length > 0) {
    throw new Error(`Stored role graph is invalid: ${problems.join('; ')}`);
  }
  return snapshot;
}

// ─────────────────────────────────────────────────────────────────────────────
// Seed file
// ─────────────────────────────────────────────────────────────────────────────

const seedGrantSchema = z.union([
  z.string(),
  z.object({ codename: z.string(), canDelegate: z.boolean() }),
]);

export const rbacSeedSchema = z.object({
  roles: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      level: z.number().int(),
      parents: z.array(z.string()).default([]),
    })
  ),
  permissions: z.array(
    z.object({
      codename: z.string().min(1),
      name: z.string().optional(),
      description: z.string(),
      category: z.string().min(1),
    })
  ),
  grants: z.record(z.array(seedGrantSchema)).default({}),
});

export type RbacSeed = z.infer<typeof rbacSeedSchema>;

export interface SeedSummary {
  rolesCreated: number;
  edgesAdded: number;
  permissionsCreated: number;
  grantsSet: number;
}

/**
 * Validate raw seed JSON
 */
export function parseSeed(raw: unknown): Result<RbacSeed> {
  const parsed = rbacSeedSchema.safeParse(raw);
  if (!parsed.success) {
    return failure('VALIDATION_ERROR', 'Invalid RBAC seed', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      ),
    });
  }
  return success(parsed.data);
}

/**
 * Parents before children; roles in a cycle never become ready
 */
function orderRoles(roles: RbacSeed['roles']): Result<RbacSeed['roles']> {
  const pending = new Map(roles.map((role) => [role.id, role] as const));
  const ordered: RbacSeed['roles'] = [];
  const placed = new Set<string>();

  while (pending.size > 0) {
    const ready = [...pending.values()].filter((role) =>
      role.parents.every((parent) => placed.has(parent) || !pending.has(parent))
    );
    if (ready.length === 0) {
      return failure('CYCLE_DETECTED', 'Seed roles inherit in a cycle', {
        roles: [...pending.keys()],
      });
    }
    for (const role of ready) {
      ordered.push(role);
      placed.add(role.id);
      pending.delete(role.id);
    }
  }
  return success(ordered);
}

/**
 * Apply a seed through the services; existing entries are left as they are
 * Every change is audited under the given actor (the system actor by default).
 */
export async function applySeed(
  services: {
    roleGraph: RoleGraphService;
    catalog: PermissionCatalogService;
  },
  seed: RbacSeed,
  actor: ActorContext = SYSTEM_ACTOR
): Promise<Result<SeedSummary>> {
  const { roleGraph, catalog } = services;
  const summary: SeedSummary = {
    rolesCreated: 0,
    edgesAdded: 0,
    permissionsCreated: 0,
    grantsSet: 0,
  };

  const ordered = orderRoles(seed.roles);
  if (!ordered.success) {
    return ordered;
  }

  for (const role of ordered.data) {
    const existing = roleGraph.getRole(role.id);
    if (existing === null) {
      const defined = await roleGraph.defineRole(actor, role);
      if (!defined.success) {
        return defined;
      }
      summary.rolesCreated += 1;
      continue;
    }
    for (const parent of role.parents) {
      if (existing.parents.includes(parent)) {
        continue;
      }
      const added = await roleGraph.addEdge(actor, role.id, parent);
      if (!added.success) {
        return added;
      }
      summary.edgesAdded += 1;
    }
  }

  for (const permission of seed.permissions) {
    if (catalog.isRegistered(permission.codename)) {
      continue;
    }
    const registered = await catalog.register(actor, { ...permission, builtIn: true });
    if (!registered.success) {
      return registered;
    }
    summary.permissionsCreated += 1;
  }

  for (const [roleId, grants] of Object.entries(seed.grants)) {
    const current = new Map(
      catalog.listRolePermissions(roleId).map((grant) => [grant.codename, grant] as const)
    );
    for (const grant of grants) {
      const codename = typeof grant === 'string' ? grant : grant.codename;
      const canDelegate = typeof grant === 'string' ? false : grant.canDelegate;
      const existing = current.get(codename);
      if (existing?.active === true && existing.canDelegate === canDelegate) {
        continue;
      }
      const set = await catalog.setRolePermission(actor, {
        roleId,
        codename,
        active: true,
        canDelegate,
      });
      if (!set.success) {
        return set;
      }
      summary.grantsSet += 1;
    }
  }

  return success(summary);
}
