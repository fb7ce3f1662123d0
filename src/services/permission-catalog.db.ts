/**
 * PermissionCatalogService Database Adapter
 * Implements PermissionCatalogServiceDb interface using Supabase
 *
 * Tables: authz_permissions, authz_role_permissions
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Permission, RolePermission } from '@/types/index.js';

import type { PermissionCatalogServiceDb } from './permission-catalog.service.js';

/**
 * Database row types
 */
const permissionRowSchema = z.object({
  codename: z.string(),
  name: z.string(),
  description: z.string(),
  category: z.string(),
  active: z.boolean(),
  built_in: z.boolean(),
  created_at: z.string(),
});

const rolePermissionRowSchema = z.object({
  role_id: z.string(),
  codename: z.string(),
  active: z.boolean(),
  can_delegate: z.boolean(),
});

type PermissionRow = z.infer<typeof permissionRowSchema>;

function mapRowToPermission(row: PermissionRow): Permission {
  return {
    codename: row.codename,
    name: row.name,
    description: row.description,
    category: row.category,
    active: row.active,
    builtIn: row.built_in,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create PermissionCatalogServiceDb implementation using Supabase
 */
export function createPermissionCatalogServiceDb(
  supabase: SupabaseClient
): PermissionCatalogServiceDb {
  return {
    async loadPermissions(): Promise<Permission[]> {
      const { data, error } = await supabase.from('authz_permissions').select('*');

      if (error !== null) {
        throw new Error(`Failed to load permissions: ${error.message}`);
      }

      return z.array(permissionRowSchema).parse(data ?? []).map(mapRowToPermission);
    },

    async loadRolePermissions(): Promise<RolePermission[]> {
      const { data, error } = await supabase
        .from('authz_role_permissions')
        .select('role_id, codename, active, can_delegate');

      if (error !== null) {
        throw new Error(`Failed to load role permissions: ${error.message}`);
      }

      return z
        .array(rolePermissionRowSchema)
        .parse(data ?? [])
        .map((row) => ({
          roleId: row.role_id,
          codename: row.codename,
          active: row.active,
          canDelegate: row.can_delegate,
        }));
    },

    async insertPermission(permission: Permission): Promise<void> {
      const { error } = await supabase.from('authz_permissions').insert({
        codename: permission.codename,
        name: permission.name,
        description: permission.description,
        category: permission.category,
        active: permission.active,
        built_in: permission.builtIn,
        created_at: permission.createdAt.toISOString(),
      });

      if (error !== null) {
        throw new Error(`Failed to insert permission: ${error.message}`);
      }
    },

    async updatePermissionActive(codename: string, active: boolean): Promise<void> {
      const { error } = await supabase
        .from('authz_permissions')
        .update({ active })
        .eq('codename', codename);

      if (error !== null) {
        throw new Error(`Failed to update permission: ${error.message}`);
      }
    },

    /**
     * Insert or replace the (role, codename) grant
     */
    async upsertRolePermission(grant: RolePermission): Promise<void> {
      const { error } = await supabase.from('authz_role_permissions').upsert(
        {
          role_id: grant.roleId,
          codename: grant.codename,
          active: grant.active,
          can_delegate: grant.canDelegate,
        },
        { onConflict: 'role_id,codename' }
      );

      if (error !== null) {
        throw new Error(`Failed to upsert role permission: ${error.message}`);
      }
    },
  };
}
