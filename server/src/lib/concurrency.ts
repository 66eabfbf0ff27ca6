export interface ConcurrencyLimiter {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly active: number;
  readonly pending: number;
}

/**
 * Admission gate of fixed capacity. A released slot is handed straight to the
 * oldest waiter, so a newcomer can never slip in between release and wake-up.
 */
export function createConcurrencyLimiter(limit: number): ConcurrencyLimiter {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }
  let active = 0;
  const queue: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (active < limit) {
      active += 1;
      return;
    }
    await new Promise<void>((resolve) => queue.push(resolve));
  };

  const release = () => {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      active = Math.max(0, active - 1);
    }
  };

  const runLimited = async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };

  return {
    run: runLimited,
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    },
  };
}

/**
 * Race a task against a timer. `onTimeout` runs before the rejection so the
 * caller can abort the underlying work.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  ms: number,
  createError: () => Error,
  onTimeout?: () => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | null = null;
  try {
    return await Promise.race([
      task,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          onTimeout?.();
          reject(createError());
        }, ms);
        timer.unref?.();
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
