/**
 * Concurrency utilities for bounded parallelism.
 *
 * Provides helpers for processing claims with controlled concurrency and
 * for serialising work per key.
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
    { length: Math.max(1, Math.min(concurrency, items.length)) },
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
 * One-at-a-time execution per key; different keys run in parallel.
 * Idle keys are dropped so the map does not grow with every claim seen.
 */
export class KeyedMutex {
  private locks = new Map<string, { semaphore: Semaphore; users: number }>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { semaphore: new Semaphore(1), users: 0 };
      this.locks.set(key, entry);
    }

    entry.users++;
    try {
      return await entry.semaphore.withPermit(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.locks.delete(key);
      }
    }
  }
}
