/**
 * User role assignment adapter
 * Implements RoleTransitionServiceDb and ResolverServiceDb using Supabase
 *
 * Table: authz_user_roles (one row per user; role_id null = no role)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Override, UserRoleAssignment } from '@/types/index.js';

import { selectOverridesForUser } from './override.db.js';
import type { ResolverServiceDb } from './resolver.service.js';
import type { RoleTransitionServiceDb } from './role-transition.service.js';

const userRoleRowSchema = z.object({
  user_id: z.string(),
  role_id: z.string().nullable(),
  assigned_by: z.string().nullable(),
  assigned_at: z.string(),
});

type UserRoleRow = z.infer<typeof userRoleRowSchema>;

function mapRowToAssignment(row: UserRoleRow): UserRoleAssignment {
  return {
    userId: row.user_id,
    roleId: row.role_id,
    assignedBy: row.assigned_by,
    assignedAt: new Date(row.assigned_at),
  };
}

async function selectAssignment(
  supabase: SupabaseClient,
  userId: string
): Promise<UserRoleAssignment | null> {
  const { data, error } = await supabase
    .from('authz_user_roles')
    .select('*')
    .eq('user_id', userId)
    .maybeSingle();

  if (error !== null) {
    throw new Error(`Failed to get user role: ${error.message}`);
  }
  if (data === null) {
    return null;
  }

  return mapRowToAssignment(userRoleRowSchema.parse(data));
}

/**
 * Create RoleTransitionServiceDb implementation using Supabase
 */
export function createUserRoleDb(supabase: SupabaseClient): RoleTransitionServiceDb {
  return {
    getAssignment(userId: string): Promise<UserRoleAssignment | null> {
      return selectAssignment(supabase, userId);
    },

    async setAssignment(assignment: UserRoleAssignment): Promise<UserRoleAssignment> {
      const { data, error } = await supabase
        .from('authz_user_roles')
        .upsert(
          {
            user_id: assignment.userId,
            role_id: assignment.roleId,
            assigned_by: assignment.assignedBy,
            assigned_at: assignment.assignedAt.toISOString(),
          },
          { onConflict: 'user_id' }
        )
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to set user role: ${error.message}`);
      }

      return mapRowToAssignment(userRoleRowSchema.parse(data));
    },
  };
}

/**
 * Create ResolverServiceDb implementation using Supabase
 */
export function createResolverServiceDb(supabase: SupabaseClient): ResolverServiceDb {
  return {
    async getUserRole(userId: string): Promise<string | null> {
      const assignment = await selectAssignment(supabase, userId);
      return assignment?.roleId ?? null;
    },

    listOverrides(userId: string): Promise<Override[]> {
      return selectOverridesForUser(supabase, userId);
    },
  };
}
