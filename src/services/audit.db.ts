/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 *
 * Table: authz_audit_log (sequence bigserial, append-only; no UPDATE or
 * DELETE is ever issued from here)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  AuditEntryDraft,
  AuditLogEntry,
  AuditQueryParams,
  PaginatedResult,
  PaginationParams,
} from '@/types/index.js';
import { AUDIT_ACTIONS, AUDIT_TARGET_TYPES } from '@/types/index.js';

import type { AuditServiceDb } from './audit.service.js';

const AUDIT_TABLE = 'authz_audit_log';

const snapshotSchema = z.record(z.unknown()).nullable();

/**
 * Database row shape
 */
const auditLogRowSchema = z.object({
  sequence: z.coerce.number().int(),
  id: z.string(),
  timestamp: z.string(),
  actor_id: z.string().nullable(),
  actor_type: z.enum(['user', 'system']),
  action: z.enum(AUDIT_ACTIONS),
  target_type: z.enum(AUDIT_TARGET_TYPES),
  target_id: z.string(),
  before: snapshotSchema,
  after: snapshotSchema,
  reason: z.string().nullable(),
  request_id: z.string().nullable(),
  ip_address: z.string().nullable(),
});

type AuditLogRow = z.infer<typeof auditLogRowSchema>;

/**
 * Map database row to AuditLogEntry entity
 */
function mapRowToEntry(row: AuditLogRow): AuditLogEntry {
  return {
    sequence: row.sequence,
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorId: row.actor_id,
    actorType: row.actor_type,
    action: row.action,
    target: { type: row.target_type, id: row.target_id },
    before: row.before,
    after: row.after,
    reason: row.reason,
    requestId: row.request_id,
    ipAddress: row.ip_address,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    /**
     * Insert one entry; the store assigns the sequence
     */
    async appendEntry(draft: AuditEntryDraft): Promise<AuditLogEntry> {
      const { data, error } = await supabase
        .from(AUDIT_TABLE)
        .insert({
          id: draft.id,
          timestamp: draft.timestamp.toISOString(),
          actor_id: draft.actorId,
          actor_type: draft.actorType,
          action: draft.action,
          target_type: draft.target.type,
          target_id: draft.target.id,
          before: draft.before,
          after: draft.after,
          reason: draft.reason,
          request_id: draft.requestId,
          ip_address: draft.ipAddress,
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to append audit entry: ${error.message}`);
      }

      return mapRowToEntry(auditLogRowSchema.parse(data));
    },

    /**
     * Filtered page, ordered by sequence ascending
     */
    async queryEntries(
      params: AuditQueryParams & PaginationParams
    ): Promise<PaginatedResult<AuditLogEntry>> {
      let query = supabase
        .from(AUDIT_TABLE)
        .select('*')
        .order('sequence', { ascending: true });

      if (params.actorId !== undefined) {
        query = query.eq('actor_id', params.actorId);
      }
      if (params.targetType !== undefined) {
        query = query.eq('target_type', params.targetType);
      }
      if (params.targetId !== undefined) {
        query = query.eq('target_id', params.targetId);
      }
      if (params.action !== undefined) {
        query = query.eq('action', params.action);
      }
      if (params.from !== undefined) {
        query = query.gte('timestamp', params.from.toISOString());
      }
      if (params.to !== undefined) {
        query = query.lte('timestamp', params.to.toISOString());
      }
      if (params.cursor !== undefined) {
        query = query.gt('sequence', params.cursor);
      }

      // Fetch one more than limit to determine hasMore
      const limit = params.limit;
      query = query.limit(limit + 1);

      const { data, error } = await query;

      if (error !== null) {
        throw new Error(`Failed to query audit entries: ${error.message}`);
      }

      const rows = z.array(auditLogRowSchema).parse(data ?? []);
      const hasMore = rows.length > limit;
      const items = rows.slice(0, limit).map(mapRowToEntry);

      const result: PaginatedResult<AuditLogEntry> = { items, hasMore };
      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = lastItem.sequence;
      }
      return result;
    },
  };
}
