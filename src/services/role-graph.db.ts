/**
 * RoleGraphService Database Adapter
 * Implements RoleGraphServiceDb interface using Supabase
 *
 * Tables: authz_roles (nodes), authz_role_edges (child_id -> parent_id)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Role } from '@/types/index.js';

import type { RoleGraphServiceDb } from './role-graph.service.js';

const roleRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  level: z.number().int(),
});

const edgeRowSchema = z.object({
  child_id: z.string(),
  parent_id: z.string(),
});

/**
 * Create RoleGraphServiceDb implementation using Supabase
 */
export function createRoleGraphServiceDb(
  supabase: SupabaseClient
): RoleGraphServiceDb {
  return {
    /**
     * All roles with their direct parents
     */
    async loadRoles(): Promise<Role[]> {
      const [rolesResult, edgesResult] = await Promise.all([
        supabase.from('authz_roles').select('id, name, level'),
        supabase.from('authz_role_edges').select('child_id, parent_id'),
      ]);

      if (rolesResult.error !== null) {
        throw new Error(`Failed to load roles: ${rolesResult.error.message}`);
      }
      if (edgesResult.error !== null) {
        throw new Error(`Failed to load role edges: ${edgesResult.error.message}`);
      }

      const parents = new Map<string, string[]>();
      for (const edge of z.array(edgeRowSchema).parse(edgesResult.data ?? [])) {
        const list = parents.get(edge.child_id) ?? [];
        list.push(edge.parent_id);
        parents.set(edge.child_id, list);
      }

      return z
        .array(roleRowSchema)
        .parse(rolesResult.data ?? [])
        .map((row) => ({
          id: row.id,
          name: row.name,
          level: row.level,
          parents: parents.get(row.id) ?? [],
        }));
    },

    /**
     * Insert a role node; its edges are written with insertEdge
     */
    async insertRole(role: Role): Promise<void> {
      const { error } = await supabase.from('authz_roles').insert({
        id: role.id,
        name: role.name,
        level: role.level,
      });

      if (error !== null) {
        throw new Error(`Failed to insert role: ${error.message}`);
      }
    },

    /**
     * Delete a role node (edges cascade)
     */
    async deleteRole(roleId: string): Promise<void> {
      const { error } = await supabase.from('authz_roles').delete().eq('id', roleId);

      if (error !== null) {
        throw new Error(`Failed to delete role: ${error.message}`);
      }
    },

    async insertEdge(childId: string, parentId: string): Promise<void> {
      const { error } = await supabase
        .from('authz_role_edges')
        .insert({ child_id: childId, parent_id: parentId });

      if (error !== null) {
        throw new Error(`Failed to insert role edge: ${error.message}`);
      }
    },

    async deleteEdge(childId: string, parentId: string): Promise<void> {
      const { error } = await supabase
        .from('authz_role_edges')
        .delete()
        .eq('child_id', childId)
        .eq('parent_id', parentId);

      if (error !== null) {
        throw new Error(`Failed to delete role edge: ${error.message}`);
      }
    },
  };
}
