/**
 * Async helpers: a FIFO mutex, per-store write serialization and bounded
 * concurrent iteration
 */

import type { SourceAdapter } from './interfaces';

/**
 * Async mutex; waiters are served in arrival order
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
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
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * One mutex per target store. Stores that upsert atomically per key are
 * written without queuing.
 */
export class WriteLocks {
  private readonly locks = new Map<SourceAdapter, Mutex>();

  run<T>(adapter: SourceAdapter, write: () => Promise<T>): Promise<T> {
    if (adapter.atomicUpsert) {
      return write();
    }

    let lock = this.locks.get(adapter);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(adapter, lock);
    }
    return lock.runExclusive(write);
  }
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order.
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
