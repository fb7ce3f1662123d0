/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type {
  Result,
  Success,
  Failure,
  AuthzErrorCode,
} from './result.js';
export {
  AUTHZ_ERROR_CODES,
  success,
  failure,
  isSuccess,
  isFailure,
  errorMessage,
} from './result.js';
export type {
  ActorContext,
  Role,
  Permission,
  RolePermission,
  OverridePolarity,
  Override,
  UserRoleAssignment,
  DefineRoleParams,
  RegisterPermissionParams,
  SetRolePermissionParams,
  CreateOverrideParams,
  RemoveOverrideParams,
  TransitionRoleParams,
  RemoveRoleParams,
  MutationOptions,
} from './auth.js';
export { SYSTEM_ACTOR } from './auth.js';
export type {
  AuditActorType,
  AuditAction,
  AuditTargetType,
  AuditTarget,
  AuditSnapshot,
  AuditEvent,
  AuditEntryDraft,
  AuditLogEntry,
  PaginationParams,
  PaginatedResult,
  AuditQueryParams,
  AuditHealth,
} from './audit.js';
export {
  AUDIT_ACTIONS,
  AUDIT_TARGET_TYPES,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  normalizePaginationParams,
} from './audit.js';
export type {
  PolicySnapshot,
  CacheStamp,
  CachedPermissions,
  RoleChangeNotice,
  NotificationSink,
} from './policy.js';
