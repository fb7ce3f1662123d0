/**
 * Result Pattern Implementation
 *
 * Every service method returns Result<T>. Rejected writes carry a named
 * AuthzErrorCode; callers never receive a bare "failed".
 */

/**
 * Error codes surfaced by the authorization services
 */
export const AUTHZ_ERROR_CODES = [
  'UNKNOWN_ROLE',
  'DUPLICATE_ROLE',
  'DUPLICATE_LEVEL',
  'CYCLE_DETECTED',
  'DUPLICATE_CODENAME',
  'UNKNOWN_PERMISSION',
  'INSUFFICIENT_AUTHORITY',
  'SELF_ESCALATION',
  'UNKNOWN_TARGET_ROLE',
  'INVALID_TRANSITION',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'TRANSIENT_FAILURE',
  'PERSISTENCE_ERROR',
  'AUDIT_WRITE_FAILURE',
] as const;

export type AuthzErrorCode = (typeof AUTHZ_ERROR_CODES)[number];

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: AuthzErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: AuthzErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}

/**
 * Narrow an unknown thrown value to a message for logs and failures
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
