/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type {
  AuditService,
  AuditServiceDb,
  AuditRecorder,
  AuditServiceOptions,
} from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// Policy snapshot
export type { PolicyState, PolicySnapshotInput } from './policy-state.js';
export { createPolicyState, buildPolicySnapshot } from './policy-state.js';

// RoleGraphService
export type { RoleGraphService, RoleGraphServiceDb } from './role-graph.service.js';
export {
  createRoleGraphService,
  closureOf,
  findCycle,
  validateRoleGraph,
} from './role-graph.service.js';
export { createRoleGraphServiceDb } from './role-graph.db.js';

// PermissionCatalogService
export type {
  PermissionCatalogService,
  PermissionCatalogServiceDb,
} from './permission-catalog.service.js';
export {
  createPermissionCatalogService,
  CODENAME_PATTERN,
} from './permission-catalog.service.js';
export { createPermissionCatalogServiceDb } from './permission-catalog.db.js';

// OverrideService
export type { OverrideService, OverrideServiceDb } from './override.service.js';
export { createOverrideService, isOverrideActive } from './override.service.js';
export { createOverrideServiceDb } from './override.db.js';

// PermissionCache
export type {
  PermissionCache,
  PermissionCacheOptions,
  CacheBackend,
} from './permission-cache.service.js';
export { createPermissionCache } from './permission-cache.service.js';

// ResolverService
export type {
  ResolverService,
  ResolverServiceDb,
  EffectivePermissions,
} from './resolver.service.js';
export {
  createResolverService,
  computeEffectivePermissions,
} from './resolver.service.js';

// RoleTransitionService
export type {
  RoleTransitionService,
  RoleTransitionServiceDb,
  RoleTransition,
} from './role-transition.service.js';
export { createRoleTransitionService } from './role-transition.service.js';
export { createUserRoleDb, createResolverServiceDb } from './user-role.db.js';
export { createSupabaseAuthzDbs } from './authz.db.js';

// Wiring and bootstrap
export type { AuthzDbs, AuthzOptions, AuthzServices } from './authz.js';
export { createAuthzServices, createLoggingNotifier } from './authz.js';
export type { RbacSeed, SeedSummary } from './bootstrap.js';
export {
  loadPolicySnapshot,
  parseSeed,
  applySeed,
  rbacSeedSchema,
} from './bootstrap.js';
export { POLICY_LOCK_KEY, userLockKey, runExclusive } from './mutation.js';
