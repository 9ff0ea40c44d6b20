/**
 * Simple Mutex implementation using closures for state management
 * Ensures proper lock release even on errors
 */
export type Mutex = {
  acquire(): Promise<() => void>;
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
  isLocked(): boolean;
  /** Number of callers waiting for the lock */
  pending(): number;
};

export function createMutex(): Mutex {
  const queue: Array<() => void> = [];
  let locked = false;

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      locked = false;
    }
  };

  const acquire = (): Promise<() => void> =>
    new Promise<() => void>((resolve) => {
      let released = false;
      const grant = (): void => {
        locked = true;
        resolve(() => {
          // Releasing twice must not hand the lock to a second waiter
          if (released) return;
          released = true;
          release();
        });
      };

      if (!locked) {
        grant();
      } else {
        queue.push(grant);
      }
    });

  const runExclusive = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  };

  return {
    acquire,
    runExclusive,
    isLocked: () => locked,
    pending: () => queue.length
  };
}
