/**
 * Seed RBAC
 * Applies config/rbac-seed.json (roles, permission catalog, role grants)
 * through the services as the system actor. Safe to re-run: existing roles,
 * permissions and grants are left alone.
 *
 * Run: npx tsx scripts/seed-rbac.ts [--superuser <userId>]
 */

import 'dotenv/config';
import { readFileSync } from 'node:fs';

import { loadConfig } from '../src/lib/config.js';
import { createMemoryCacheBackend } from '../src/lib/memory-cache.js';
import { createSupabaseAdmin } from '../src/lib/supabase.js';
import { createSupabaseAuthzDbs } from '../src/services/authz.db.js';
import { createAuthzServices } from '../src/services/authz.js';
import { applySeed, loadPolicySnapshot, parseSeed } from '../src/services/bootstrap.js';
import { SYSTEM_ACTOR } from '../src/types/index.js';

const SEED_PATH = new URL('../config/rbac-seed.json', import.meta.url);

function superuserArg(argv: readonly string[]): string | null {
  const index = argv.indexOf('--superuser');
  if (index === -1) {
    return null;
  }
  return argv[index + 1] ?? null;
}

async function seedRbac(): Promise<void> {
  console.log('Seeding RBAC...\n');

  const seed = parseSeed(JSON.parse(readFileSync(SEED_PATH, 'utf8')));
  if (!seed.success) {
    console.error('Seed file is invalid:', seed.error);
    process.exit(1);
  }

  const config = loadConfig();
  const supabase = createSupabaseAdmin(config.supabase);
  const dbs = createSupabaseAuthzDbs(supabase);

  const snapshot = await loadPolicySnapshot({
    roleGraphDb: dbs.roleGraph,
    catalogDb: dbs.catalog,
  });
  const services = createAuthzServices({
    dbs,
    cacheBackend: createMemoryCacheBackend(),
    snapshot,
    options: {
      topRole: config.authz.topRole,
      cacheTtlSeconds: config.authz.cacheTtlSeconds,
      lockTimeoutMs: config.authz.lockTimeoutMs,
      auditMaxRetries: config.audit.maxRetries,
      auditRetryIntervalMs: config.audit.retryIntervalMs,
    },
  });

  const result = await applySeed(
    { roleGraph: services.roleGraph, catalog: services.catalog },
    seed.data
  );
  if (!result.success) {
    console.error('Seeding failed:', result.error);
    process.exit(1);
  }

  const summary = result.data;
  console.log(`   Roles created:       ${summary.rolesCreated}`);
  console.log(`   Edges added:         ${summary.edgesAdded}`);
  console.log(`   Permissions created: ${summary.permissionsCreated}`);
  console.log(`   Grants set:          ${summary.grantsSet}`);

  const superuserId = superuserArg(process.argv.slice(2));
  if (superuserId !== null) {
    const assigned = await services.transitions.transition(SYSTEM_ACTOR, {
      targetUserId: superuserId,
      toRole: config.authz.topRole,
      reason: 'Initial superuser from seed script',
    });
    if (!assigned.success && assigned.error.code !== 'INVALID_TRANSITION') {
      console.error('Superuser assignment failed:', assigned.error);
      process.exit(1);
    }
    console.log(`\n   ${superuserId} holds ${config.authz.topRole}`);
  }

  await services.auditService.flushPending();
  const health = services.auditService.getHealth();
  if (!health.healthy) {
    console.error(
      `Audit trail incomplete: ${health.pending} pending, ${health.dropped} dropped`
    );
    process.exit(1);
  }

  console.log('\nRBAC seed complete.');
}

seedRbac().catch((err: unknown) => {
  console.error('Seed script failed:', err);
  process.exit(1);
});
