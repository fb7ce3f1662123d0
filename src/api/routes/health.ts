/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { AuditHealth } from '@/types/index.js';

interface HealthRoutesDeps {
  auditHealth: () => AuditHealth;
  policyVersion: () => number;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   * Reports degraded (still 200) while audit entries are waiting for retry
   */
  app.get('/health', (c) => {
    const audit = deps.auditHealth();

    return c.json({
      status: audit.healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version: 'v1',
      policyVersion: deps.policyVersion(),
      audit,
    });
  });

  return app;
}
