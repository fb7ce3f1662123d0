/**
 * Mutation helpers shared by the write-side services
 */

import { LockTimeoutError, type UserLock } from '@/lib/user-lock.js';
import type { MutationOptions, Result } from '@/types/index.js';
import { errorMessage, failure } from '@/types/index.js';

/**
 * Lock key serialising structural changes to the policy snapshot
 */
export const POLICY_LOCK_KEY = 'policy';

export function userLockKey(userId: string): string {
  return `user:${userId}`;
}

/**
 * Run a mutation while holding `key`
 *
 * A lock wait that times out surfaces as TRANSIENT_FAILURE (retryable);
 * anything thrown by the store surfaces as PERSISTENCE_ERROR.
 */
export async function runExclusive<T>(
  lock: UserLock,
  key: string,
  options: MutationOptions | undefined,
  fn: () => Promise<Result<T>>
): Promise<Result<T>> {
  try {
    const lockOptions =
      options?.timeoutMs !== undefined
        ? { timeoutMs: options.timeoutMs }
        : undefined;
    return await lock.run(key, fn, lockOptions);
  } catch (err) {
    if (err instanceof LockTimeoutError) {
      return failure(
        'TRANSIENT_FAILURE',
        'Another change to the same record is in progress, retry',
        { key: err.key, timeoutMs: err.timeoutMs }
      );
    }
    console.error(`Mutation on ${key} failed:`, err);
    return failure('PERSISTENCE_ERROR', `Failed to persist change: ${errorMessage(err)}`);
  }
}
