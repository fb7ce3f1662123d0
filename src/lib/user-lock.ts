/**
 * Keyed write lock
 *
 * Serialises mutations that target the same key (a user id, or the global
 * policy key). Waiters are served FIFO; a waiter that exceeds its timeout
 * leaves the queue and receives LockTimeoutError.
 */

export class LockTimeoutError extends Error {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number
  ) {
    super(`Lock acquisition timed out after ${timeoutMs}ms for key: ${key}`);
    this.name = 'LockTimeoutError';
  }
}

export interface LockOptions {
  /** 0 waits forever */
  timeoutMs?: number;
}

export interface UserLock {
  run<T>(key: string, fn: () => Promise<T>, options?: LockOptions): Promise<T>;
  isLocked(key: string): boolean;
  queueLength(key: string): number;
}

interface Waiter {
  resolve: () => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

export function createUserLock(
  options: { defaultTimeoutMs?: number } = {}
): UserLock {
  const defaultTimeoutMs = options.defaultTimeoutMs ?? 5000;
  const held = new Set<string>();
  const queues = new Map<string, Waiter[]>();

  function removeWaiter(key: string, waiter: Waiter): void {
    const queue = queues.get(key);
    if (queue === undefined) {
      return;
    }
    const index = queue.indexOf(waiter);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      queues.delete(key);
    }
  }

  function acquire(key: string, timeoutMs: number): Promise<void> {
    if (!held.has(key)) {
      held.add(key);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve };
      if (timeoutMs > 0) {
        waiter.timeoutId = setTimeout(() => {
          removeWaiter(key, waiter);
          reject(new LockTimeoutError(key, timeoutMs));
        }, timeoutMs);
      }
      const queue = queues.get(key) ?? [];
      queue.push(waiter);
      queues.set(key, queue);
    });
  }

  function release(key: string): void {
    const queue = queues.get(key);
    const next = queue?.shift();
    if (queue !== undefined && queue.length === 0) {
      queues.delete(key);
    }
    if (next === undefined) {
      held.delete(key);
      return;
    }
    // Ownership passes straight to the next waiter; the key stays held.
    if (next.timeoutId !== undefined) {
      clearTimeout(next.timeoutId);
    }
    next.resolve();
  }

  return {
    async run<T>(
      key: string,
      fn: () => Promise<T>,
      runOptions?: LockOptions
    ): Promise<T> {
      await acquire(key, runOptions?.timeoutMs ?? defaultTimeoutMs);
      try {
        return await fn();
      } finally {
        release(key);
      }
    },

    isLocked(key: string): boolean {
      return held.has(key);
    },

    queueLength(key: string): number {
      return queues.get(key)?.length ?? 0;
    },
  };
}
