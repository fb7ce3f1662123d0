/**
 * OverrideService Database Adapter
 * Implements OverrideServiceDb interface using Supabase
 *
 * Table: authz_overrides, unique on (user_id, codename, polarity)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Override } from '@/types/index.js';

import type { OverrideServiceDb } from './override.service.js';

const OVERRIDE_TABLE = 'authz_overrides';

/**
 * Database row type
 */
const overrideRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  codename: z.string(),
  polarity: z.enum(['grant', 'deny']),
  reason: z.string(),
  expires_at: z.string().nullable(),
  created_by: z.string().nullable(),
  created_at: z.string(),
});

type OverrideRow = z.infer<typeof overrideRowSchema>;

/**
 * Map database row to Override entity
 */
export function mapRowToOverride(row: OverrideRow): Override {
  return {
    id: row.id,
    userId: row.user_id,
    codename: row.codename,
    polarity: row.polarity,
    reason: row.reason,
    expiresAt: row.expires_at !== null ? new Date(row.expires_at) : null,
    createdBy: row.created_by,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Every override row of one user, expired ones included
 */
export async function selectOverridesForUser(
  supabase: SupabaseClient,
  userId: string
): Promise<Override[]> {
  const { data, error } = await supabase
    .from(OVERRIDE_TABLE)
    .select('*')
    .eq('user_id', userId)
    .order('created_at', { ascending: true });

  if (error !== null) {
    throw new Error(`Failed to list overrides: ${error.message}`);
  }

  return z.array(overrideRowSchema).parse(data ?? []).map(mapRowToOverride);
}

/**
 * Create OverrideServiceDb implementation using Supabase
 */
export function createOverrideServiceDb(
  supabase: SupabaseClient
): OverrideServiceDb {
  return {
    listForUser(userId: string): Promise<Override[]> {
      return selectOverridesForUser(supabase, userId);
    },

    async getById(overrideId: string): Promise<Override | null> {
      const { data, error } = await supabase
        .from(OVERRIDE_TABLE)
        .select('*')
        .eq('id', overrideId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get override: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToOverride(overrideRowSchema.parse(data));
    },

    /**
     * Insert, or replace the row for the same (user, codename, polarity)
     */
    async upsert(override: Override): Promise<Override> {
      const { data, error } = await supabase
        .from(OVERRIDE_TABLE)
        .upsert(
          {
            id: override.id,
            user_id: override.userId,
            codename: override.codename,
            polarity: override.polarity,
            reason: override.reason,
            expires_at: override.expiresAt?.toISOString() ?? null,
            created_by: override.createdBy,
            created_at: override.createdAt.toISOString(),
          },
          { onConflict: 'user_id,codename,polarity' }
        )
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to save override: ${error.message}`);
      }

      return mapRowToOverride(overrideRowSchema.parse(data));
    },

    async delete(overrideId: string): Promise<boolean> {
      const { data, error } = await supabase
        .from(OVERRIDE_TABLE)
        .delete()
        .eq('id', overrideId)
        .select('id');

      if (error !== null) {
        throw new Error(`Failed to delete override: ${error.message}`);
      }

      return (data ?? []).length > 0;
    },

    async setExpiry(overrideId: string, expiresAt: Date): Promise<Override | null> {
      const { data, error } = await supabase
        .from(OVERRIDE_TABLE)
        .update({ expires_at: expiresAt.toISOString() })
        .eq('id', overrideId)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to expire override: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToOverride(overrideRowSchema.parse(data));
    },
  };
}
