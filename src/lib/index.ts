/**
 * Shared Library Exports
 * Infrastructure adapters and primitives used across the application
 */

export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createSupabaseAdmin } from './supabase.js';
export { createRedis, createRedisCacheBackend } from './redis.js';
export { createMemoryCacheBackend } from './memory-cache.js';
export { createUserLock, LockTimeoutError } from './user-lock.js';
export type { UserLock, LockOptions } from './user-lock.js';
