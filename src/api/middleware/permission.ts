/**
 * Permission Middleware
 * Gates a route on one catalog permission, decided by the Resolver, or on a
 * minimum role level in the hierarchy
 */

import type { Context, MiddlewareHandler, Next } from 'hono';

import type { ResolverService } from '@/services/resolver.service.js';
import type { RoleGraphService } from '@/services/role-graph.service.js';
import type { RoleTransitionService } from '@/services/role-transition.service.js';

export type RequirePermission = (codename: string) => MiddlewareHandler;
export type RequireRoleLevel = (minimumRole: string) => MiddlewareHandler;

/**
 * Create the requirePermission(codename) factory bound to a resolver
 */
export function createPermissionMiddleware(
  resolver: Pick<ResolverService, 'resolve'>
): RequirePermission {
  return function requirePermission(codename: string): MiddlewareHandler {
    return async function permissionMiddleware(
      c: Context,
      next: Next
    ): Promise<Response | void> {
      const actor = c.get('actor');
      const requestId = actor.requestId;

      if (actor.userId === undefined) {
        return c.json(
          {
            error: {
              code: 'UNAUTHORIZED',
              message: 'Authentication required',
              requestId,
            },
          },
          401
        );
      }

      const allowed = await resolver.resolve(actor.userId, codename);
      if (!allowed) {
        return c.json(
          {
            error: {
              code: 'PERMISSION_DENIED',
              message: `Permission required: ${codename}`,
              requestId,
            },
          },
          403
        );
      }

      await next();
    };
  };
}

/**
 * Create the requireRoleLevel(minimumRole) factory
 * Passes users whose role level is at least that of `minimumRole`; an
 * unknown minimum role or a user without a role is denied.
 */
export function createRoleLevelMiddleware(deps: {
  roleGraph: Pick<RoleGraphService, 'level'>;
  transitions: Pick<RoleTransitionService, 'getUserRole'>;
}): RequireRoleLevel {
  const { roleGraph, transitions } = deps;

  return function requireRoleLevel(minimumRole: string): MiddlewareHandler {
    return async function roleLevelMiddleware(
      c: Context,
      next: Next
    ): Promise<Response | void> {
      const actor = c.get('actor');
      const requestId = actor.requestId;

      if (actor.userId === undefined) {
        return c.json(
          {
            error: {
              code: 'UNAUTHORIZED',
              message: 'Authentication required',
              requestId,
            },
          },
          401
        );
      }

      const required = roleGraph.level(minimumRole);
      const role = await transitions.getUserRole(actor.userId);
      if (!role.success) {
        console.error(`Role lookup failed for ${actor.userId}:`, role.error.message);
      }
      const held = role.success && role.data !== null ? roleGraph.level(role.data) : null;

      if (required === null || held === null || held < required) {
        return c.json(
          {
            error: {
              code: 'PERMISSION_DENIED',
              message: `Role required: ${minimumRole} or higher`,
              requestId,
            },
          },
          403
        );
      }

      await next();
    };
  };
}
