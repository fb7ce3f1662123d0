/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { AuditService } from '@/services/audit.service.js';
import type { OverrideService } from '@/services/override.service.js';
import type { PermissionCatalogService } from '@/services/permission-catalog.service.js';
import type { PolicyState } from '@/services/policy-state.js';
import type { ResolverService } from '@/services/resolver.service.js';
import type { RoleGraphService } from '@/services/role-graph.service.js';
import type { RoleTransitionService } from '@/services/role-transition.service.js';

import { createAuthMiddleware, createPublicMiddleware } from './middleware/auth.js';
import type { TokenVerifier } from './middleware/auth.js';
import { createPermissionMiddleware } from './middleware/permission.js';
import { createAuthzRoutes } from './routes/authz.js';
import { createHealthRoutes } from './routes/health.js';

/**
 * Services the HTTP layer delegates to
 */
export interface ApiServices {
  resolver: ResolverService;
  roleGraph: RoleGraphService;
  catalog: PermissionCatalogService;
  overrides: OverrideService;
  transitions: RoleTransitionService;
  auditService: Pick<AuditService, 'query' | 'getHealth'>;
  policyState: Pick<PolicyState, 'current'>;
}

/**
 * App configuration
 */
interface AppConfig {
  verifyToken: TokenVerifier;
  services: ApiServices;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { verifyToken, services, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route(
    '/api/v1',
    createHealthRoutes({
      auditHealth: () => services.auditService.getHealth(),
      policyVersion: () => services.policyState.current().version,
    })
  );

  // Authorization routes (auth, then per-route permission)
  const authMiddleware = createAuthMiddleware({ verifyToken });
  app.use('/api/v1/authz/*', authMiddleware);
  app.route(
    '/api/v1',
    createAuthzRoutes({
      resolver: services.resolver,
      roleGraph: services.roleGraph,
      catalog: services.catalog,
      overrides: services.overrides,
      transitions: services.transitions,
      auditService: services.auditService,
      requirePermission: createPermissionMiddleware(services.resolver),
    })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      500
    );
  });

  return app;
}
