/**
 * Authorization Routes
 * Permission checks for the caller and the administrative surface over
 * roles, the permission catalog, overrides, role assignments and the audit
 * trail.
 *
 * Every admin route is gated by a catalog permission checked through the
 * Resolver:
 *   manage_permissions - role graph, catalog, role grants, overrides
 *   assign_roles       - role listing and user role changes
 *   view_audit_logs    - audit queries
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { AuditService } from '@/services/audit.service.js';
import type { OverrideService } from '@/services/override.service.js';
import type { PermissionCatalogService } from '@/services/permission-catalog.service.js';
import type { ResolverService } from '@/services/resolver.service.js';
import type { RoleGraphService } from '@/services/role-graph.service.js';
import type { RoleTransitionService } from '@/services/role-transition.service.js';
import type {
  ActorContext,
  AuditLogEntry,
  Override,
  Permission,
  Role,
  RolePermission,
} from '@/types/index.js';
import { AUDIT_ACTIONS, AUDIT_TARGET_TYPES } from '@/types/index.js';

import type { RequirePermission } from '../middleware/permission.js';
import { errorResponse, paginatedResponse, successResponse } from '../utils/response.js';

interface AuthzRoutesDeps {
  resolver: ResolverService;
  roleGraph: RoleGraphService;
  catalog: PermissionCatalogService;
  overrides: OverrideService;
  transitions: RoleTransitionService;
  auditService: Pick<AuditService, 'query'>;
  requirePermission: RequirePermission;
}

// ─────────────────────────────────────────────────────────────────────────────
// Request schemas
// ─────────────────────────────────────────────────────────────────────────────

const checkSchema = z.object({
  permissions: z.array(z.string().min(1)).min(1).max(100),
});

const defineRoleSchema = z.object({
  id: z.string().min(1).max(64),
  name: z.string().min(1).max(128),
  level: z.number().int(),
  parents: z.array(z.string().min(1)).optional(),
});

const addParentSchema = z.object({
  parentId: z.string().min(1),
});

const registerPermissionSchema = z.object({
  codename: z.string().min(1).max(128),
  name: z.string().min(1).max(128).optional(),
  description: z.string().max(1000).default(''),
  category: z.string().min(1).max(64),
});

const setActiveSchema = z.object({
  active: z.boolean(),
});

const setRolePermissionSchema = z.object({
  active: z.boolean(),
  canDelegate: z.boolean().optional(),
});

const createOverrideSchema = z.object({
  codename: z.string().min(1),
  polarity: z.enum(['grant', 'deny']),
  reason: z.string().min(1).max(500),
  expiresAt: z.coerce.date().nullable().optional(),
});

const transitionSchema = z.object({
  role: z.string().min(1),
  reason: z.string().max(500).optional(),
});

const removeRoleSchema = z.object({
  reason: z.string().max(500).optional(),
});

const auditQuerySchema = z.object({
  cursor: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().positive().optional(),
  actorId: z.string().min(1).optional(),
  targetType: z.enum(AUDIT_TARGET_TYPES).optional(),
  targetId: z.string().min(1).optional(),
  action: z.enum(AUDIT_ACTIONS).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Parse a JSON body, treating a missing or malformed body as empty
 */
async function readBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

function validationError(
  c: Context,
  error: z.ZodError,
  requestId: string
): Response {
  return errorResponse(
    c,
    {
      code: 'VALIDATION_ERROR',
      message: error.issues[0]?.message ?? 'Invalid request',
      details: error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    },
    requestId
  );
}

function formatRole(role: Role): {
  id: string;
  name: string;
  level: number;
  parents: string[];
} {
  return {
    id: role.id,
    name: role.name,
    level: role.level,
    parents: [...role.parents],
  };
}

function formatPermission(permission: Permission): {
  codename: string;
  name: string;
  description: string;
  category: string;
  active: boolean;
  builtIn: boolean;
  createdAt: string;
} {
  return {
    codename: permission.codename,
    name: permission.name,
    description: permission.description,
    category: permission.category,
    active: permission.active,
    builtIn: permission.builtIn,
    createdAt: permission.createdAt.toISOString(),
  };
}

function formatOverride(override: Override): {
  id: string;
  userId: string;
  codename: string;
  polarity: string;
  reason: string;
  expiresAt: string | null;
  createdBy: string | null;
  createdAt: string;
} {
  return {
    id: override.id,
    userId: override.userId,
    codename: override.codename,
    polarity: override.polarity,
    reason: override.reason,
    expiresAt: override.expiresAt?.toISOString() ?? null,
    createdBy: override.createdBy,
    createdAt: override.createdAt.toISOString(),
  };
}

function formatAuditEntry(entry: AuditLogEntry): Omit<AuditLogEntry, 'timestamp'> & {
  timestamp: string;
} {
  return { ...entry, timestamp: entry.timestamp.toISOString() };
}

function formatGrant(grant: RolePermission): RolePermission {
  return { ...grant };
}

/**
 * Create authorization routes (mounted under /api/v1)
 */
export function createAuthzRoutes(deps: AuthzRoutesDeps): Hono {
  const {
    resolver,
    roleGraph,
    catalog,
    overrides,
    transitions,
    auditService,
    requirePermission,
  } = deps;
  const app = new Hono();

  const managePermissions = requirePermission('manage_permissions');
  const assignRoles = requirePermission('assign_roles');
  const viewAuditLogs = requirePermission('view_audit_logs');

  // ───────────────────────────────────────────────────────────────────────────
  // Caller's own permissions
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * GET /authz/me/permissions
   * Effective permission set of the caller
   */
  app.get('/authz/me/permissions', async (c) => {
    const actor = getActor(c);
    const userId = actor.userId;
    if (userId === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'User ID not found in token' },
        actor.requestId
      );
    }

    const [role, effective] = await Promise.all([
      transitions.getUserRole(userId),
      resolver.resolveAll(userId),
    ]);

    return successResponse(
      c,
      {
        userId,
        role: role.success ? role.data : null,
        permissions: [...effective].sort(),
      },
      actor.requestId
    );
  });

  /**
   * POST /authz/check
   * Batch check for the caller, e.g. the gates of one page
   */
  app.post('/authz/check', async (c) => {
    const actor = getActor(c);
    const userId = actor.userId;
    if (userId === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'User ID not found in token' },
        actor.requestId
      );
    }

    const validation = checkSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const decisions = await resolver.resolveMany(userId, validation.data.permissions);
    return successResponse(c, decisions, actor.requestId);
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Roles
  // ───────────────────────────────────────────────────────────────────────────

  app.get('/authz/roles', assignRoles, (c) => {
    const actor = getActor(c);
    return successResponse(c, roleGraph.listRoles().map(formatRole), actor.requestId);
  });

  app.post('/authz/roles', managePermissions, async (c) => {
    const actor = getActor(c);
    const validation = defineRoleSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const result = await roleGraph.defineRole(actor, validation.data);
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatRole(result.data), actor.requestId, 201);
  });

  app.post('/authz/roles/:id/parents', managePermissions, async (c) => {
    const actor = getActor(c);
    const validation = addParentSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const result = await roleGraph.addEdge(
      actor,
      c.req.param('id'),
      validation.data.parentId
    );
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatRole(result.data), actor.requestId);
  });

  app.delete('/authz/roles/:id/parents/:parentId', managePermissions, async (c) => {
    const actor = getActor(c);
    const result = await roleGraph.removeEdge(
      actor,
      c.req.param('id'),
      c.req.param('parentId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatRole(result.data), actor.requestId);
  });

  app.get('/authz/roles/:id/permissions', managePermissions, (c) => {
    const actor = getActor(c);
    const roleId = c.req.param('id');
    if (roleGraph.getRole(roleId) === null) {
      return errorResponse(
        c,
        { code: 'UNKNOWN_ROLE', message: `Role ${roleId} does not exist` },
        actor.requestId
      );
    }
    return successResponse(
      c,
      catalog.listRolePermissions(roleId).map(formatGrant),
      actor.requestId
    );
  });

  app.put('/authz/roles/:id/permissions/:codename', managePermissions, async (c) => {
    const actor = getActor(c);
    const validation = setRolePermissionSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const body = validation.data;
    const result = await catalog.setRolePermission(actor, {
      roleId: c.req.param('id'),
      codename: c.req.param('codename'),
      active: body.active,
      ...(body.canDelegate !== undefined && { canDelegate: body.canDelegate }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatGrant(result.data), actor.requestId);
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Permission catalog
  // ───────────────────────────────────────────────────────────────────────────

  app.get('/authz/permissions', managePermissions, (c) => {
    const actor = getActor(c);
    const category = c.req.query('category');
    const activeOnly = c.req.query('active') === 'true';

    let permissions =
      category !== undefined ? catalog.listByCategory(category) : catalog.listAll();
    if (activeOnly) {
      permissions = permissions.filter((permission) => permission.active);
    }
    return successResponse(c, permissions.map(formatPermission), actor.requestId);
  });

  app.post('/authz/permissions', managePermissions, async (c) => {
    const actor = getActor(c);
    const validation = registerPermissionSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const body = validation.data;
    const result = await catalog.register(actor, {
      codename: body.codename,
      description: body.description,
      category: body.category,
      ...(body.name !== undefined && { name: body.name }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatPermission(result.data), actor.requestId, 201);
  });

  app.patch('/authz/permissions/:codename', managePermissions, async (c) => {
    const actor = getActor(c);
    const validation = setActiveSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const result = await catalog.setActive(
      actor,
      c.req.param('codename'),
      validation.data.active
    );
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatPermission(result.data), actor.requestId);
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Overrides
  // ───────────────────────────────────────────────────────────────────────────

  app.get('/authz/users/:id/overrides', managePermissions, async (c) => {
    const actor = getActor(c);
    const result = await overrides.listForUser(c.req.param('id'), {
      includeExpired: c.req.query('includeExpired') === 'true',
    });
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, result.data.map(formatOverride), actor.requestId);
  });

  app.post('/authz/users/:id/overrides', managePermissions, async (c) => {
    const actor = getActor(c);
    const validation = createOverrideSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const body = validation.data;
    const params = {
      userId: c.req.param('id'),
      codename: body.codename,
      reason: body.reason,
      expiresAt: body.expiresAt ?? null,
    };
    const result =
      body.polarity === 'grant'
        ? await overrides.grant(actor, params)
        : await overrides.deny(actor, params);
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatOverride(result.data), actor.requestId, 201);
  });

  app.delete(
    '/authz/users/:id/overrides/:codename/:polarity',
    managePermissions,
    async (c) => {
      const actor = getActor(c);
      const polarity = c.req.param('polarity');
      if (polarity !== 'grant' && polarity !== 'deny') {
        return errorResponse(
          c,
          { code: 'VALIDATION_ERROR', message: 'polarity must be grant or deny' },
          actor.requestId
        );
      }

      const result = await overrides.remove(actor, {
        userId: c.req.param('id'),
        codename: c.req.param('codename'),
        polarity,
      });
      if (!result.success) {
        return errorResponse(c, result.error, actor.requestId);
      }
      return successResponse(c, { removed: true }, actor.requestId);
    }
  );

  app.post('/authz/overrides/:id/expire', managePermissions, async (c) => {
    const actor = getActor(c);
    const result = await overrides.expire(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, formatOverride(result.data), actor.requestId);
  });

  app.get('/authz/users/:id/permissions', managePermissions, async (c) => {
    const actor = getActor(c);
    const effective = await resolver.resolveAll(c.req.param('id'));
    return successResponse(c, [...effective].sort(), actor.requestId);
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Role assignments
  // ───────────────────────────────────────────────────────────────────────────

  app.get('/authz/users/:id/role', assignRoles, async (c) => {
    const actor = getActor(c);
    const userId = c.req.param('id');
    const result = await transitions.getUserRole(userId);
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, { userId, role: result.data }, actor.requestId);
  });

  app.put('/authz/users/:id/role', assignRoles, async (c) => {
    const actor = getActor(c);
    const validation = transitionSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const body = validation.data;
    const result = await transitions.transition(actor, {
      targetUserId: c.req.param('id'),
      toRole: body.role,
      ...(body.reason !== undefined && { reason: body.reason }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(
      c,
      {
        userId: result.data.userId,
        fromRole: result.data.fromRole,
        toRole: result.data.toRole,
      },
      actor.requestId
    );
  });

  app.delete('/authz/users/:id/role', assignRoles, async (c) => {
    const actor = getActor(c);
    const validation = removeRoleSchema.safeParse(await readBody(c));
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const reason = validation.data.reason;
    const result = await transitions.removeRole(actor, {
      targetUserId: c.req.param('id'),
      ...(reason !== undefined && { reason }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(
      c,
      { userId: result.data.userId, fromRole: result.data.fromRole, toRole: null },
      actor.requestId
    );
  });

  app.get('/authz/users/:id/transitions', assignRoles, async (c) => {
    const actor = getActor(c);
    const result = await transitions.listTransitions(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return successResponse(c, result.data.map(formatAuditEntry), actor.requestId);
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Audit trail
  // ───────────────────────────────────────────────────────────────────────────

  app.get('/authz/audit', viewAuditLogs, async (c) => {
    const actor = getActor(c);
    const validation = auditQuerySchema.safeParse(c.req.query());
    if (!validation.success) {
      return validationError(c, validation.error, actor.requestId);
    }

    const query = validation.data;
    const result = await auditService.query({
      ...(query.cursor !== undefined && { cursor: query.cursor }),
      ...(query.limit !== undefined && { limit: query.limit }),
      ...(query.actorId !== undefined && { actorId: query.actorId }),
      ...(query.targetType !== undefined && { targetType: query.targetType }),
      ...(query.targetId !== undefined && { targetId: query.targetId }),
      ...(query.action !== undefined && { action: query.action }),
      ...(query.from !== undefined && { from: query.from }),
      ...(query.to !== undefined && { to: query.to }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, actor.requestId);
    }
    return paginatedResponse(
      c,
      { ...result.data, items: result.data.items.map(formatAuditEntry) },
      actor.requestId
    );
  });

  return app;
}
