/**
 * Supabase adapters for the whole authorization service graph
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { createAuditServiceDb } from './audit.db.js';
import type { AuthzDbs } from './authz.js';
import { createOverrideServiceDb } from './override.db.js';
import { createPermissionCatalogServiceDb } from './permission-catalog.db.js';
import { createRoleGraphServiceDb } from './role-graph.db.js';
import { createResolverServiceDb, createUserRoleDb } from './user-role.db.js';

export function createSupabaseAuthzDbs(supabase: SupabaseClient): AuthzDbs {
  return {
    roleGraph: createRoleGraphServiceDb(supabase),
    catalog: createPermissionCatalogServiceDb(supabase),
    overrides: createOverrideServiceDb(supabase),
    userRoles: createUserRoleDb(supabase),
    resolver: createResolverServiceDb(supabase),
    audit: createAuditServiceDb(supabase),
  };
}
