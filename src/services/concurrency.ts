/**
 * Concurrency utilities.
 *
 * Bounded parallelism for batch work against payers, and per-key
 * serialization for state that must change one step at a time.
 */

/**
 * Map over items with bounded concurrency.
 *
 * @param items - Items to process
 * @param concurrency - Maximum concurrent operations
 * @param fn - Async function to apply to each item
 * @returns Results in the same order as inputs
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item !== undefined) {
        results[index] = await fn(item, index);
      }
    }
  }

  const workers = Array.from(
    { length: Math.min(concurrency, items.length) },
    () => worker()
  );

  await Promise.all(workers);
  return results;
}

/**
 * A simple semaphore for limiting concurrent operations.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  /**
   * Execute a function with a permit.
   */
  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * One single-permit semaphore per key.
 * Work for the same key runs in arrival order; different keys never wait
 * on each other. Idle keys are dropped.
 */
export class KeyedLock {
  private locks = new Map<string, { semaphore: Semaphore; holders: number }>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { semaphore: new Semaphore(1), holders: 0 };
      this.locks.set(key, lock);
    }
    lock.holders++;

    try {
      return await lock.semaphore.withPermit(fn);
    } finally {
      lock.holders--;
      if (lock.holders === 0) this.locks.delete(key);
    }
  }

  /** Keys with running or queued work */
  get activeKeys(): number {
    return this.locks.size;
  }
}
