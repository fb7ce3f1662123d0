/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';
import type { AuditHealth } from '@/types/index.js';

function createTestApp(audit: AuditHealth, policyVersion = 3): Hono {
  const app = new Hono();
  app.route(
    '/api/v1',
    createHealthRoutes({ auditHealth: () => audit, policyVersion: () => policyVersion })
  );
  return app;
}

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status ok', async () => {
      const app = createTestApp({ pending: 0, dropped: 0, healthy: true });

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        timestamp: expect.any(String),
        version: 'v1',
        policyVersion: 3,
        audit: { pending: 0, dropped: 0, healthy: true },
      });
    });

    it('should report degraded while audit entries are pending', async () => {
      const app = createTestApp({ pending: 2, dropped: 0, healthy: false });

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'degraded',
        audit: { pending: 2, dropped: 0, healthy: false },
      });
    });
  });
});
