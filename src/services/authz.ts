/**
 * Authorization service graph
 *
 * Wires the services around one PolicyState, one PermissionCache and one
 * keyed lock. Used by the server entry point, the seed script and tests.
 */

import { createUserLock } from '@/lib/user-lock.js';
import type { UserLock } from '@/lib/user-lock.js';
import type { NotificationSink, PolicySnapshot, RoleChangeNotice } from '@/types/index.js';

import { createAuditService } from './audit.service.js';
import type { AuditService, AuditServiceDb } from './audit.service.js';
import { createOverrideService } from './override.service.js';
import type { OverrideService, OverrideServiceDb } from './override.service.js';
import { createPermissionCache } from './permission-cache.service.js';
import type { CacheBackend, PermissionCache } from './permission-cache.service.js';
import { createPermissionCatalogService } from './permission-catalog.service.js';
import type {
  PermissionCatalogService,
  PermissionCatalogServiceDb,
} from './permission-catalog.service.js';
import { createPolicyState } from './policy-state.js';
import type { PolicyState } from './policy-state.js';
import { createResolverService } from './resolver.service.js';
import type { ResolverService, ResolverServiceDb } from './resolver.service.js';
import { createRoleGraphService } from './role-graph.service.js';
import type { RoleGraphService, RoleGraphServiceDb } from './role-graph.service.js';
import { createRoleTransitionService } from './role-transition.service.js';
import type {
  RoleTransitionService,
  RoleTransitionServiceDb,
} from './role-transition.service.js';

export interface AuthzDbs {
  roleGraph: RoleGraphServiceDb;
  catalog: PermissionCatalogServiceDb;
  overrides: OverrideServiceDb;
  userRoles: RoleTransitionServiceDb;
  resolver: ResolverServiceDb;
  audit: AuditServiceDb;
}

export interface AuthzOptions {
  topRole: string;
  cacheTtlSeconds: number;
  lockTimeoutMs: number;
  auditMaxRetries: number;
  auditRetryIntervalMs: number;
}

export interface AuthzServices {
  state: PolicyState;
  cache: PermissionCache;
  lock: UserLock;
  auditService: AuditService;
  roleGraph: RoleGraphService;
  catalog: PermissionCatalogService;
  overrides: OverrideService;
  resolver: ResolverService;
  transitions: RoleTransitionService;
}

/**
 * Default notification sink: log the change
 */
export function createLoggingNotifier(): NotificationSink {
  return {
    notify(notice: RoleChangeNotice): Promise<void> {
      console.warn(
        `Role changed for ${notice.userId}: ${notice.oldRole ?? 'none'} -> ${notice.newRole ?? 'none'} (by ${notice.actorId ?? 'system'})`
      );
      return Promise.resolve();
    },
  };
}

export function createAuthzServices(deps: {
  dbs: AuthzDbs;
  cacheBackend: CacheBackend;
  options: AuthzOptions;
  snapshot?: PolicySnapshot;
  notifier?: NotificationSink;
  now?: () => Date;
}): AuthzServices {
  const { dbs, cacheBackend, options } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const nowMs = (): number => now().getTime();

  const state = createPolicyState(deps.snapshot);
  const cache = createPermissionCache({
    backend: cacheBackend,
    ttlSeconds: options.cacheTtlSeconds,
    now: nowMs,
  });
  const lock = createUserLock({ defaultTimeoutMs: options.lockTimeoutMs });

  const auditService = createAuditService(
    { db: dbs.audit },
    {
      maxRetries: options.auditMaxRetries,
      retryIntervalMs: options.auditRetryIntervalMs,
      now,
    }
  );

  const roleGraph = createRoleGraphService({
    db: dbs.roleGraph,
    state,
    cache,
    auditService,
    lock,
    topRole: options.topRole,
  });

  const catalog = createPermissionCatalogService({
    db: dbs.catalog,
    state,
    cache,
    auditService,
    lock,
    now,
  });

  const overrides = createOverrideService({
    db: dbs.overrides,
    state,
    cache,
    auditService,
    lock,
    now,
  });

  const resolver = createResolverService({
    db: dbs.resolver,
    state,
    cache,
    topRole: options.topRole,
    now: nowMs,
  });

  const transitions = createRoleTransitionService({
    db: dbs.userRoles,
    roleGraph,
    cache,
    auditService,
    notifier: deps.notifier ?? createLoggingNotifier(),
    lock,
    now,
  });

  return {
    state,
    cache,
    lock,
    auditService,
    roleGraph,
    catalog,
    overrides,
    resolver,
    transitions,
  };
}
