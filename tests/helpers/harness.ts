/**
 * Test harness
 * Full service graph over in-memory stores, seeded from config/rbac-seed.json
 */

import { readFileSync } from 'node:fs';

import { vi } from 'vitest';
import type { Mock } from 'vitest';

import { createMemoryCacheBackend } from '@/lib/memory-cache.js';
import { createAuthzServices } from '@/services/authz.js';
import type { AuthzServices } from '@/services/authz.js';
import { loadPolicySnapshot, parseSeed } from '@/services/bootstrap.js';
import type { RbacSeed } from '@/services/bootstrap.js';
import type { CacheBackend } from '@/services/permission-cache.service.js';
import type { ActorContext, RoleChangeNotice } from '@/types/index.js';

import { createInMemoryDbs } from './in-memory-db.js';
import type { InMemoryAuthzStore } from './in-memory-db.js';

export const TEST_NOW = new Date('2026-03-01T12:00:00.000Z');

export function loadTestSeed(): RbacSeed {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../config/rbac-seed.json', import.meta.url), 'utf8')
  );
  const parsed = parseSeed(raw);
  if (!parsed.success) {
    throw new Error(`Seed fixture is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

export interface TestClock {
  now(): Date;
  advance(ms: number): void;
}

export function createTestClock(start: Date = TEST_NOW): TestClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

/**
 * Write the seed straight into the store (no audit entries)
 */
export function seedStore(store: InMemoryAuthzStore, seed: RbacSeed, at: Date): void {
  for (const role of seed.roles) {
    store.roles.set(role.id, { ...role });
  }
  for (const permission of seed.permissions) {
    store.permissions.set(permission.codename, {
      codename: permission.codename,
      name: permission.name ?? permission.codename,
      description: permission.description,
      category: permission.category,
      active: true,
      builtIn: true,
      createdAt: at,
    });
  }
  for (const [roleId, grants] of Object.entries(seed.grants)) {
    for (const grant of grants) {
      const codename = typeof grant === 'string' ? grant : grant.codename;
      store.rolePermissions.set(`${roleId}:${codename}`, {
        roleId,
        codename,
        active: true,
        canDelegate: typeof grant === 'string' ? false : grant.canDelegate,
      });
    }
  }
}

export interface Harness extends AuthzServices {
  dbs: ReturnType<typeof createInMemoryDbs>['dbs'];
  store: InMemoryAuthzStore;
  clock: TestClock;
  notifier: { notify: Mock<(notice: RoleChangeNotice) => Promise<void>> };
  /** Put a user straight into a role, bypassing transition rules */
  assign(userId: string, roleId: string | null): void;
}

export async function createHarness(
  options: {
    seeded?: boolean;
    cacheBackend?: CacheBackend;
    lockTimeoutMs?: number;
    auditMaxRetries?: number;
  } = {}
): Promise<Harness> {
  const { dbs, store } = createInMemoryDbs();
  const clock = createTestClock();
  if (options.seeded !== false) {
    seedStore(store, loadTestSeed(), clock.now());
  }

  const snapshot = await loadPolicySnapshot({
    roleGraphDb: dbs.roleGraph,
    catalogDb: dbs.catalog,
  });
  const notify = vi
    .fn<(notice: RoleChangeNotice) => Promise<void>>()
    .mockResolvedValue(undefined);
  const notifier = { notify };

  const services = createAuthzServices({
    dbs,
    cacheBackend:
      options.cacheBackend ?? createMemoryCacheBackend(() => clock.now().getTime()),
    snapshot,
    notifier,
    now: () => clock.now(),
    options: {
      topRole: 'superuser',
      cacheTtlSeconds: 300,
      lockTimeoutMs: options.lockTimeoutMs ?? 200,
      auditMaxRetries: options.auditMaxRetries ?? 3,
      auditRetryIntervalMs: 1000,
    },
  });

  return {
    ...services,
    dbs,
    store,
    clock,
    notifier,
    assign(userId: string, roleId: string | null) {
      store.userRoles.set(userId, {
        userId,
        roleId,
        assignedBy: null,
        assignedAt: clock.now(),
      });
    },
  };
}

export function userActor(userId: string): ActorContext {
  return { type: 'user', userId, requestId: `req-${userId}` };
}
