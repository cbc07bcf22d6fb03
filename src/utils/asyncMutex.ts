/**
 * Async Mutex Utility
 *
 * Serializes critical sections such as state-file saves and index writes.
 * Waiters are served in FIFO order.
 */

import { getLogger } from './logger.js';

/**
 * @example
 * ```typescript
 * const mutex = new AsyncMutex('SyncState');
 *
 * await mutex.withLock(async () => {
 *   await writeState();
 * });
 * ```
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];
  private readonly name: string;

  /**
   * @param name - Component name used in log lines
   */
  constructor(name?: string) {
    this.name = name ?? 'AsyncMutex';
  }

  /**
   * Acquire the lock, waiting behind earlier callers
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Hand the lock to the next waiter, or unlock
   */
  release(): void {
    if (!this.locked) {
      getLogger().warn(this.name, 'release() called when mutex is not locked');
      return;
    }

    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }

    this.locked = false;
  }

  /**
   * Run `fn` while holding the lock; the lock is released even if it throws
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
