/**
 * Concurrency Limiter
 *
 * FIFO slot limiter bounding how many query variants hit the indexes at
 * once. Waiters abandoned by an aborted signal leave the queue.
 *
 * @module @groundwork/rag/runtime/limiter
 */

import { StageTimeoutError } from '../errors';

interface QueuedTask {
  resolve: () => void;
  reject: (error: Error) => void;
}

export interface LimiterStatus {
  active: number;
  queued: number;
  available: number;
  peakConcurrent: number;
}

export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private activeCount = 0;
  private peakConcurrent = 0;
  private queue: QueuedTask[] = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Acquire a slot, waiting in FIFO order when all slots are busy
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new StageTimeoutError('queued task', 0, 'deadline'));
    }

    if (this.activeCount < this.maxConcurrent) {
      this.activeCount++;
      this.peakConcurrent = Math.max(this.peakConcurrent, this.activeCount);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(task);
        if (index !== -1) {
          this.queue.splice(index, 1);
          reject(new StageTimeoutError('queued task', 0, 'deadline'));
        }
      };

      const task: QueuedTask = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject,
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(task);
    });
  }

  /**
   * Release a slot and hand it to the next waiter, if any
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the waiter; activeCount is unchanged
      next.resolve();
      return;
    }
    this.activeCount = Math.max(0, this.activeCount - 1);
  }

  /**
   * Run a task inside a slot
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStatus(): LimiterStatus {
    return {
      active: this.activeCount,
      queued: this.queue.length,
      available: Math.max(0, this.maxConcurrent - this.activeCount),
      peakConcurrent: this.peakConcurrent,
    };
  }
}
