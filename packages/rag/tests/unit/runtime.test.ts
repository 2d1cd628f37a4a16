/**
 * Deadline and Concurrency Limiter Tests
 *
 * @module @groundwork/rag/tests/unit/runtime
 */

import { describe, it, expect, vi } from 'vitest';
import { RequestDeadline, withTimeout } from '../../src/runtime/deadline';
import { ConcurrencyLimiter } from '../../src/runtime/limiter';
import { StageTimeoutError, isDeadlineError } from '../../src/errors';

const never = <T>() => new Promise<T>(() => undefined);

describe('withTimeout', () => {
  it('should resolve with the task result inside the budget', async () => {
    await expect(
      withTimeout(async () => 'done', { label: 'lookup', timeoutMs: 100 })
    ).resolves.toBe('done');
  });

  it('should reject with a stage timeout and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;

    const pending = withTimeout(
      (signal) => {
        taskSignal = signal;
        return never<string>();
      },
      { label: 'lookup', timeoutMs: 5 }
    );

    await expect(pending).rejects.toThrow('lookup timed out after 5ms');
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should pass task failures through unchanged', async () => {
    const failure = new Error('index offline');

    await expect(
      withTimeout(() => Promise.reject(failure), { label: 'lookup', timeoutMs: 100 })
    ).rejects.toBe(failure);
  });

  it('should reject immediately once the request deadline has expired', async () => {
    const controller = new AbortController();
    controller.abort();
    const deadline = new RequestDeadline(1000, controller.signal);
    const task = vi.fn(async () => 'never runs');

    const error = await withTimeout(task, { label: 'lookup', timeoutMs: 100, deadline }).catch(
      (e: unknown) => e
    );

    expect(isDeadlineError(error)).toBe(true);
    expect(task).not.toHaveBeenCalled();
    deadline.dispose();
  });

  it('should report a deadline error when the deadline is shorter than the stage budget', async () => {
    const deadline = new RequestDeadline(5);

    const error = await withTimeout(() => never<string>(), {
      label: 'rerank',
      timeoutMs: 1000,
      deadline,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageTimeoutError);
    expect(isDeadlineError(error)).toBe(true);

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(deadline.expired).toBe(true);
    expect(deadline.remaining()).toBe(0);
    deadline.dispose();
  });
});

describe('RequestDeadline', () => {
  it('should expire when the caller aborts', () => {
    const controller = new AbortController();
    const deadline = new RequestDeadline(10_000, controller.signal);

    expect(deadline.expired).toBe(false);
    controller.abort();
    expect(deadline.expired).toBe(true);
    deadline.dispose();
  });
});

describe('ConcurrencyLimiter', () => {
  it('should never run more tasks than its limit', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all(Array.from({ length: 5 }, () => limiter.run(task)));

    expect(peak).toBe(2);
    expect(limiter.getStatus()).toEqual({ active: 0, queued: 0, available: 2, peakConcurrent: 2 });
  });

  it('should start queued tasks in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = limiter.run(async () => {
      order.push('first');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
    });
    const second = limiter.run(async () => {
      order.push('second');
    });
    const third = limiter.run(async () => {
      order.push('third');
    });

    expect(limiter.getStatus().queued).toBe(2);
    await new Promise((resolve) => setTimeout(resolve, 0));
    releaseFirst();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('should drop a waiter whose signal aborts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const controller = new AbortController();
    let releaseFirst: () => void = () => undefined;

    const first = limiter.run(
      () =>
        new Promise<void>((resolve) => {
          releaseFirst = resolve;
        })
    );
    const waiting = limiter.run(async () => 'late', controller.signal);
    await new Promise((resolve) => setTimeout(resolve, 0));

    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(StageTimeoutError);
    expect(limiter.getStatus().queued).toBe(0);
    releaseFirst();
    await first;
    expect(limiter.getStatus().active).toBe(0);
  });

  it('should reject an invalid limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });
});
