/**
 * Authorization Engine Entry Point
 *
 * Loads the policy snapshot, wires the services and starts the Hono
 * application. The server does not listen until the snapshot is loaded.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { createSupabaseTokenVerifier } from './api/middleware/auth.js';
import { loadConfig } from './lib/config.js';
import { createMemoryCacheBackend } from './lib/memory-cache.js';
import { createRedis, createRedisCacheBackend } from './lib/redis.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import { createSupabaseAuthzDbs } from './services/authz.db.js';
import { createAuthzServices } from './services/authz.js';
import { loadPolicySnapshot } from './services/bootstrap.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const supabase = createSupabaseAdmin(config.supabase);
  const dbs = createSupabaseAuthzDbs(supabase);

  const cacheBackend =
    config.redis !== null
      ? createRedisCacheBackend(createRedis(config.redis))
      : createMemoryCacheBackend();
  if (config.redis === null) {
    console.warn('UPSTASH_REDIS_URL not set, using in-process permission cache');
  }

  const snapshot = await loadPolicySnapshot({
    roleGraphDb: dbs.roleGraph,
    catalogDb: dbs.catalog,
  });
  if (!snapshot.roles.has(config.authz.topRole)) {
    console.warn(
      `Top role ${config.authz.topRole} is not defined; run the RBAC seed before granting access`
    );
  }

  const services = createAuthzServices({
    dbs,
    cacheBackend,
    snapshot,
    options: {
      topRole: config.authz.topRole,
      cacheTtlSeconds: config.authz.cacheTtlSeconds,
      lockTimeoutMs: config.authz.lockTimeoutMs,
      auditMaxRetries: config.audit.maxRetries,
      auditRetryIntervalMs: config.audit.retryIntervalMs,
    },
  });
  services.auditService.start();

  const app = createApp({
    verifyToken: createSupabaseTokenVerifier(supabase),
    services: {
      resolver: services.resolver,
      roleGraph: services.roleGraph,
      catalog: services.catalog,
      overrides: services.overrides,
      transitions: services.transitions,
      auditService: services.auditService,
      policyState: services.state,
    },
    allowedOrigins: ['http://localhost:5173', 'http://localhost:3000'],
  });

  console.error(
    `Policy loaded: ${snapshot.roles.size} roles, ${snapshot.permissions.size} permissions`
  );
  console.error(`Server starting on port ${config.port}`);

  serve({
    fetch: app.fetch,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
