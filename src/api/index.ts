/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices } from './app.js';
export {
  createAuthMiddleware,
  createPublicMiddleware,
  createSupabaseTokenVerifier,
} from './middleware/auth.js';
export type { TokenVerifier } from './middleware/auth.js';
export {
  createPermissionMiddleware,
  createRoleLevelMiddleware,
} from './middleware/permission.js';
export type { RequirePermission, RequireRoleLevel } from './middleware/permission.js';
export { createAuthzRoutes } from './routes/authz.js';
export { createHealthRoutes } from './routes/health.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
