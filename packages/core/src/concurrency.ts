/**
 * @module concurrency
 * Bounded parallelism for read-only fan-out work such as health probes.
 */

// =====================================================================
// Semaphore: generic async concurrency limiter
// =====================================================================

export class Semaphore {
  private current = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    if (max < 1) throw new Error('Semaphore max must be >= 1');
    this.max = max;
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else if (this.current > 0) {
      this.current--;
    }
  }
}

// =====================================================================
// Fan-out / fan-in
// =====================================================================

/**
 * Run `task` for every item with at most `limit` in flight and wait for all
 * of them. Results keep input order; a rejected task does not stop the rest.
 */
export async function settleWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(Math.max(1, limit));
  return Promise.allSettled(
    items.map(async (item) => {
      await semaphore.acquire();
      try {
        return await task(item);
      } finally {
        semaphore.release();
      }
    }),
  );
}

/** Race a promise against a timer; the timer is cleared either way. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => T): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
