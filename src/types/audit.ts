/**
 * Audit Types
 * Append-only trail of every authorization mutation
 */

/**
 * Actor types for audit logging
 */
export type AuditActorType = 'user' | 'system';

/**
 * Every mutation kind that produces exactly one audit entry
 */
export const AUDIT_ACTIONS = [
  'role:define',
  'role_edge:add',
  'role_edge:remove',
  'permission:register',
  'permission:set_active',
  'role_permission:set',
  'override:create',
  'override:remove',
  'override:expire',
  'role:assign',
  'role:remove',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const AUDIT_TARGET_TYPES = [
  'role',
  'permission',
  'role_permission',
  'override',
  'user',
] as const;

export type AuditTargetType = (typeof AUDIT_TARGET_TYPES)[number];

export interface AuditTarget {
  type: AuditTargetType;
  id: string;
}

export type AuditSnapshot = Record<string, unknown> | null;

/**
 * Event to be recorded
 * Used as input to AuditService.record()
 */
export interface AuditEvent {
  action: AuditAction;
  target: AuditTarget;
  before: AuditSnapshot;
  after: AuditSnapshot;
  reason?: string;
}

/**
 * Entry handed to the store; sequence is assigned on append
 */
export interface AuditEntryDraft {
  id: string;
  timestamp: Date;
  actorId: string | null;
  actorType: AuditActorType;
  action: AuditAction;
  target: AuditTarget;
  before: AuditSnapshot;
  after: AuditSnapshot;
  reason: string | null;
  requestId: string | null;
  ipAddress: string | null;
}

/**
 * Full audit record (from database)
 */
export interface AuditLogEntry extends AuditEntryDraft {
  sequence: number;
}

/**
 * Cursor pagination over sequence numbers
 */
export interface PaginationParams {
  cursor?: number; // sequence of the last item already seen
  limit: number; // default 20, max 100
}

export interface PaginatedResult<T> {
  items: T[];
  nextCursor?: number;
  hasMore: boolean;
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Normalize pagination params with defaults
 */
export function normalizePaginationParams(
  params: Partial<PaginationParams>
): PaginationParams {
  const limit = Math.min(
    Math.max(params.limit ?? DEFAULT_PAGE_LIMIT, 1),
    MAX_PAGE_LIMIT
  );
  const result: PaginationParams = { limit };
  if (params.cursor !== undefined) {
    result.cursor = params.cursor;
  }
  return result;
}

/**
 * Parameters for querying the audit trail
 * Results are ordered by sequence ascending, never by timestamp.
 */
export interface AuditQueryParams extends Partial<PaginationParams> {
  actorId?: string;
  targetType?: AuditTargetType;
  targetId?: string;
  action?: AuditAction;
  from?: Date;
  to?: Date;
}

/**
 * Health of the audit writer
 */
export interface AuditHealth {
  pending: number;
  dropped: number;
  healthy: boolean;
}
