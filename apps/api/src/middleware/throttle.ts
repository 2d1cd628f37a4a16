/**
 * Request Throttling Middleware
 *
 * FIFO admission control in front of the query endpoints. Requests beyond
 * `maxConcurrent` wait in a bounded queue; a full queue is rejected at once
 * with 503 and a request that waits longer than `queueTimeoutMs` gets 504.
 *
 * @module apps/api/middleware/throttle
 */

import type { Context, Next } from 'hono';

// ============================================================================
// Configuration
// ============================================================================

export interface ThrottleConfig {
  /** Maximum concurrent requests */
  maxConcurrent: number;
  /** Maximum queue size */
  maxQueueSize: number;
  /** Queue timeout in milliseconds */
  queueTimeoutMs: number;
}

const DEFAULT_CONFIG: ThrottleConfig = {
  maxConcurrent: 10,
  maxQueueSize: 50,
  queueTimeoutMs: 30000,
};

/** Requests slower than this are logged */
const SLOW_REQUEST_MS = 10000;

// ============================================================================
// Metrics
// ============================================================================

export interface ThrottleMetrics {
  currentConcurrent: number;
  currentQueueSize: number;
  totalRequests: number;
  totalQueued: number;
  totalRejected: number;
  totalTimedOut: number;
  avgQueueWaitMs: number;
  peakConcurrent: number;
  peakQueueSize: number;
}

export interface ThrottleStatus {
  active: number;
  queued: number;
  available: number;
  queueCapacity: number;
}

// ============================================================================
// Request Queue
// ============================================================================

interface QueuedRequest {
  resolve: () => void;
  enqueuedAt: number;
}

export class RequestThrottle {
  private config: ThrottleConfig;
  private activeCount = 0;
  private queue: QueuedRequest[] = [];
  private metrics: ThrottleMetrics = emptyMetrics(0, 0);
  private totalQueueWaitMs = 0;
  private processedFromQueue = 0;

  constructor(config: Partial<ThrottleConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxConcurrent) || this.config.maxConcurrent < 1) {
      throw new RangeError(
        `maxConcurrent must be a positive integer, got ${this.config.maxConcurrent}`
      );
    }
  }

  /**
   * Wait for a processing slot
   *
   * @throws ThrottleError when the queue is full or the wait times out
   */
  async acquire(): Promise<void> {
    this.metrics.totalRequests++;

    if (this.activeCount < this.config.maxConcurrent) {
      this.activeCount++;
      this.updateMetrics();
      return;
    }

    if (this.queue.length >= this.config.maxQueueSize) {
      this.metrics.totalRejected++;
      throw new ThrottleError(
        'Service is temporarily overloaded. Please try again later.',
        'QUEUE_FULL',
        this.getMetrics()
      );
    }

    this.metrics.totalQueued++;
    return new Promise<void>((resolve, reject) => {
      const enqueuedAt = Date.now();

      const entry: QueuedRequest = {
        resolve: () => {
          clearTimeout(timeoutId);
          this.totalQueueWaitMs += Date.now() - enqueuedAt;
          this.processedFromQueue++;
          resolve();
        },
        enqueuedAt,
      };

      const timeoutId = setTimeout(() => {
        const index = this.queue.indexOf(entry);
        if (index === -1) return;

        this.queue.splice(index, 1);
        this.metrics.totalTimedOut++;
        this.updateMetrics();
        reject(
          new ThrottleError(
            'Request timed out waiting in queue. Please try again.',
            'QUEUE_TIMEOUT',
            this.getMetrics()
          )
        );
      }, this.config.queueTimeoutMs);

      this.queue.push(entry);
      this.updateMetrics();
    });
  }

  /**
   * Release a slot; the oldest queued request takes it over
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next.resolve();
    } else if (this.activeCount > 0) {
      this.activeCount--;
    }

    this.updateMetrics();
  }

  private updateMetrics(): void {
    this.metrics.currentConcurrent = this.activeCount;
    this.metrics.currentQueueSize = this.queue.length;
    this.metrics.peakConcurrent = Math.max(this.metrics.peakConcurrent, this.activeCount);
    this.metrics.peakQueueSize = Math.max(this.metrics.peakQueueSize, this.queue.length);
    if (this.processedFromQueue > 0) {
      this.metrics.avgQueueWaitMs = this.totalQueueWaitMs / this.processedFromQueue;
    }
  }

  getMetrics(): ThrottleMetrics {
    return { ...this.metrics };
  }

  /**
   * Zero the counters; current and peak values restart from the present state
   */
  resetMetrics(): void {
    this.metrics = emptyMetrics(this.activeCount, this.queue.length);
    this.totalQueueWaitMs = 0;
    this.processedFromQueue = 0;
  }

  getStatus(): ThrottleStatus {
    return {
      active: this.activeCount,
      queued: this.queue.length,
      available: Math.max(0, this.config.maxConcurrent - this.activeCount),
      queueCapacity: this.config.maxQueueSize - this.queue.length,
    };
  }

  get maxConcurrent(): number {
    return this.config.maxConcurrent;
  }
}

function emptyMetrics(active: number, queued: number): ThrottleMetrics {
  return {
    currentConcurrent: active,
    currentQueueSize: queued,
    totalRequests: 0,
    totalQueued: 0,
    totalRejected: 0,
    totalTimedOut: 0,
    avgQueueWaitMs: 0,
    peakConcurrent: active,
    peakQueueSize: queued,
  };
}

// ============================================================================
// Error Types
// ============================================================================

export type ThrottleErrorType = 'QUEUE_FULL' | 'QUEUE_TIMEOUT';

export class ThrottleError extends Error {
  public readonly errorType: ThrottleErrorType;
  public readonly metrics: ThrottleMetrics;

  constructor(message: string, errorType: ThrottleErrorType, metrics: ThrottleMetrics) {
    super(message);
    this.name = 'ThrottleError';
    this.errorType = errorType;
    this.metrics = metrics;
  }
}

// ============================================================================
// Middleware Factory
// ============================================================================

/**
 * @param endpointName - used in slow-request log lines
 */
export function createThrottleMiddleware(throttle: RequestThrottle, endpointName: string) {
  return async (c: Context, next: Next): Promise<Response | void> => {
    const startTime = Date.now();

    try {
      await throttle.acquire();
    } catch (error) {
      if (error instanceof ThrottleError) {
        return c.json(
          {
            error: error.errorType,
            message: error.message,
            details: {
              currentConcurrent: error.metrics.currentConcurrent,
              currentQueueSize: error.metrics.currentQueueSize,
            },
          },
          error.errorType === 'QUEUE_FULL' ? 503 : 504
        );
      }
      throw error;
    }

    const status = throttle.getStatus();
    c.header('X-Throttle-Active', status.active.toString());
    c.header('X-Throttle-Queued', status.queued.toString());

    try {
      await next();
    } finally {
      throttle.release();

      const duration = Date.now() - startTime;
      if (duration > SLOW_REQUEST_MS) {
        console.info(
          `[${endpointName}] Slow request: ${duration}ms, ` +
            `concurrent: ${status.active}, queued: ${status.queued}`
        );
      }
    }
  };
}
