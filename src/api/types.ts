/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ActorContext, AuthzErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta?: {
    pagination?: CursorMeta;
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Cursor pagination metadata (audit sequence numbers)
 */
export interface CursorMeta {
  nextCursor: number | null;
  hasMore: boolean;
}

export type ApiErrorCode = AuthzErrorCode | 'UNAUTHORIZED' | 'PERMISSION_DENIED';

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 503;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ApiErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  INSUFFICIENT_AUTHORITY: 403,
  SELF_ESCALATION: 403,
  VALIDATION_ERROR: 400,
  CYCLE_DETECTED: 400,
  INVALID_TRANSITION: 400,
  UNKNOWN_TARGET_ROLE: 400,
  NOT_FOUND: 404,
  UNKNOWN_ROLE: 404,
  UNKNOWN_PERMISSION: 404,
  DUPLICATE_ROLE: 409,
  DUPLICATE_LEVEL: 409,
  DUPLICATE_CODENAME: 409,
  TRANSIENT_FAILURE: 503,
  PERSISTENCE_ERROR: 500,
  AUDIT_WRITE_FAILURE: 500,
};

function isApiErrorCode(code: string): code is ApiErrorCode {
  return Object.hasOwn(ERROR_STATUS_MAP, code);
}

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return isApiErrorCode(code) ? ERROR_STATUS_MAP[code] : 500;
}
