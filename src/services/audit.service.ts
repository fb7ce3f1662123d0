/**
 * AuditService Implementation
 *
 * Purpose: Append-only trail of authorization mutations.
 * Owns: authz_audit_log
 * Dependencies: None (lowest level service)
 *
 * A failed append never blocks or reverses the mutation that produced it.
 * The entry is queued, retried in order, and surfaced through console.error
 * and getHealth() until it is written or exhausts its retries.
 */

import { nanoid } from 'nanoid';

import type {
  ActorContext,
  AuditEntryDraft,
  AuditEvent,
  AuditHealth,
  AuditLogEntry,
  AuditQueryParams,
  AuditTargetType,
  PaginatedResult,
  PaginationParams,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  normalizePaginationParams,
  MAX_PAGE_LIMIT,
} from '@/types/index.js';

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  /** Appends the entry and returns it with its store-assigned sequence */
  appendEntry: (draft: AuditEntryDraft) => Promise<AuditLogEntry>;
  queryEntries: (
    params: AuditQueryParams & PaginationParams
  ) => Promise<PaginatedResult<AuditLogEntry>>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  record(actor: ActorContext, event: AuditEvent): Promise<Result<AuditLogEntry>>;
  query(
    params: AuditQueryParams
  ): Promise<Result<PaginatedResult<AuditLogEntry>>>;
  getTargetHistory(
    targetType: AuditTargetType,
    targetId: string
  ): Promise<Result<AuditLogEntry[]>>;
  getActorHistory(
    actorId: string,
    params: Partial<PaginationParams>
  ): Promise<Result<PaginatedResult<AuditLogEntry>>>;
  flushPending(): Promise<number>;
  getHealth(): AuditHealth;
  start(): void;
  stop(): void;
}

/**
 * Write side used by the mutating services
 */
export type AuditRecorder = Pick<AuditService, 'record'>;

export interface AuditServiceOptions {
  maxRetries?: number;
  retryIntervalMs?: number;
  now?: () => Date;
}

interface PendingEntry {
  draft: AuditEntryDraft;
  attempts: number;
}

/**
 * Build the stored draft from actor and event
 */
function buildDraft(
  actor: ActorContext,
  event: AuditEvent,
  timestamp: Date
): AuditEntryDraft {
  return {
    id: nanoid(),
    timestamp,
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    target: event.target,
    before: event.before,
    after: event.after,
    reason: event.reason ?? null,
    requestId: actor.requestId,
    ipAddress: actor.ip ?? null,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(
  deps: { db: AuditServiceDb },
  options: AuditServiceOptions = {}
): AuditService {
  const { db } = deps;
  const maxRetries = options.maxRetries ?? 5;
  const retryIntervalMs = options.retryIntervalMs ?? 10000;
  const now = options.now ?? ((): Date => new Date());

  const pending: PendingEntry[] = [];
  let dropped = 0;
  let flushing: Promise<number> | null = null;
  let timer: ReturnType<typeof setInterval> | null = null;

  async function drainQueue(): Promise<number> {
    let written = 0;
    while (pending.length > 0) {
      const head = pending[0];
      if (head === undefined) {
        break;
      }
      try {
        await db.appendEntry(head.draft);
        pending.shift();
        written += 1;
      } catch (err) {
        head.attempts += 1;
        if (head.attempts < maxRetries) {
          console.error(
            `Audit retry ${head.attempts}/${maxRetries} failed for ${head.draft.action} (${head.draft.id}): ${errorMessage(err)}`
          );
          break;
        }
        pending.shift();
        dropped += 1;
        console.error(
          `ALERT audit entry permanently lost after ${head.attempts} attempts:`,
          JSON.stringify(head.draft)
        );
      }
    }
    return written;
  }

  function flushPending(): Promise<number> {
    if (flushing === null) {
      flushing = drainQueue().finally(() => {
        flushing = null;
      });
    }
    return flushing;
  }

  return {
    /**
     * Record one mutation
     * This is the ONLY way to write to the audit log
     */
    async record(
      actor: ActorContext,
      event: AuditEvent
    ): Promise<Result<AuditLogEntry>> {
      const draft = buildDraft(actor, event, now());

      // Older entries go first so sequence order follows mutation order
      if (pending.length > 0) {
        await flushPending();
      }
      if (pending.length > 0) {
        pending.push({ draft, attempts: 0 });
        console.error(
          `Audit log degraded: queued ${event.action} behind ${pending.length - 1} pending entries`
        );
        return failure('AUDIT_WRITE_FAILURE', 'Audit entry queued for retry', {
          entryId: draft.id,
          pending: pending.length,
        });
      }

      try {
        const entry = await db.appendEntry(draft);
        return success(entry);
      } catch (err) {
        pending.push({ draft, attempts: 1 });
        console.error(
          `Audit write failed for ${event.action} on ${event.target.type}:${event.target.id}, queued for retry: ${errorMessage(err)}`
        );
        return failure('AUDIT_WRITE_FAILURE', 'Audit entry queued for retry', {
          entryId: draft.id,
          pending: pending.length,
        });
      }
    },

    /**
     * Query the trail, ordered by sequence ascending
     */
    async query(
      params: AuditQueryParams
    ): Promise<Result<PaginatedResult<AuditLogEntry>>> {
      if (
        params.from !== undefined &&
        params.to !== undefined &&
        params.from.getTime() > params.to.getTime()
      ) {
        return failure('VALIDATION_ERROR', '`from` must not be after `to`');
      }

      const normalizedParams = {
        ...params,
        ...normalizePaginationParams(params),
      };

      try {
        const result = await db.queryEntries(normalizedParams);
        return success(result);
      } catch (err) {
        return failure(
          'PERSISTENCE_ERROR',
          `Failed to query audit log: ${errorMessage(err)}`
        );
      }
    },

    /**
     * Full history of one target, oldest first
     */
    async getTargetHistory(
      targetType: AuditTargetType,
      targetId: string
    ): Promise<Result<AuditLogEntry[]>> {
      const entries: AuditLogEntry[] = [];
      let cursor: number | undefined;

      for (;;) {
        const page = await this.query({
          targetType,
          targetId,
          limit: MAX_PAGE_LIMIT,
          ...(cursor !== undefined && { cursor }),
        });
        if (!page.success) {
          return page;
        }
        entries.push(...page.data.items);
        if (!page.data.hasMore || page.data.nextCursor === undefined) {
          return success(entries);
        }
        cursor = page.data.nextCursor;
      }
    },

    /**
     * Entries written by one actor
     */
    async getActorHistory(
      actorId: string,
      params: Partial<PaginationParams>
    ): Promise<Result<PaginatedResult<AuditLogEntry>>> {
      return this.query({ ...params, actorId });
    },

    flushPending,

    getHealth(): AuditHealth {
      return {
        pending: pending.length,
        dropped,
        healthy: pending.length === 0 && dropped === 0,
      };
    },

    start(): void {
      if (timer !== null) {
        return;
      }
      timer = setInterval(() => {
        if (pending.length === 0) {
          return;
        }
        flushPending().catch((err: unknown) => {
          console.error('Audit retry loop failed:', err);
        });
      }, retryIntervalMs);
      timer.unref();
    },

    stop(): void {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
