// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Concurrency primitives for I/O-bound pipeline work.
 */

/**
 * Simple semaphore for limiting concurrent async operations.
 * A semaphore with one permit serves as a mutex.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waitQueue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${maxPermits}`);
    }
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit, waiting if necessary.
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Release a permit, handing it to the oldest waiter if there is one.
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  /**
   * Execute a function while holding a permit.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): { available: number; max: number; waiting: number } {
    return {
      available: this.permits,
      max: this.maxPermits,
      waiting: this.waitQueue.length,
    };
  }
}

/**
 * One mutex per key, created on demand and dropped when idle.
 */
export class KeyedMutex {
  private locks = new Map<string, { semaphore: Semaphore; holders: number }>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { semaphore: new Semaphore(1), holders: 0 };
      this.locks.set(key, lock);
    }
    lock.holders++;
    try {
      return await lock.semaphore.run(fn);
    } finally {
      lock.holders--;
      if (lock.holders === 0) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with a holder or waiter */
  get size(): number {
    return this.locks.size;
  }
}

/**
 * Process items with at most `concurrency` in flight.
 * Results keep input order. The first rejection rejects the whole call;
 * items not yet started are then skipped.
 */
export async function processInParallel<T, R>(
  items: T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number = 4
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const currentIndex = next++;
      try {
        results[currentIndex] = await processor(items[currentIndex], currentIndex);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker()
  );
  await Promise.all(workers);
  return results;
}
