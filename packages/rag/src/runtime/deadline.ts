/**
 * Request Deadlines and Stage Timeouts
 *
 * A RequestDeadline owns the abort signal handed to every collaborator call
 * of one request. withTimeout bounds a single call by its own stage budget
 * and by whatever is left of the request deadline, whichever is smaller.
 *
 * @module @groundwork/rag/runtime/deadline
 */

import { StageTimeoutError } from '../errors';

export class RequestDeadline {
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout>;
  private readonly expiresAt: number;
  private readonly parent?: AbortSignal;
  private readonly onParentAbort = () => this.controller.abort();

  constructor(budgetMs: number, parent?: AbortSignal) {
    this.expiresAt = Date.now() + budgetMs;
    this.timer = setTimeout(() => this.controller.abort(), budgetMs);
    this.parent = parent;

    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Milliseconds left before the deadline, never negative
   */
  remaining(): number {
    if (this.expired) return 0;
    return Math.max(0, this.expiresAt - Date.now());
  }

  /**
   * Expire ahead of the timer, e.g. when a stage clipped to the deadline runs out first
   */
  expire(): void {
    this.controller.abort();
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}

export interface TimeoutOptions {
  /** Used in the timeout error message */
  label: string;
  /** Budget of this stage alone */
  timeoutMs: number;
  deadline?: RequestDeadline;
}

/**
 * Run a task bounded by its stage budget and the request deadline.
 *
 * The task receives an abort signal that fires on either expiry. A task that
 * ignores the signal keeps running, but its result is no longer awaited.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { label, timeoutMs, deadline } = options;

  if (deadline?.expired) {
    return Promise.reject(new StageTimeoutError(label, timeoutMs, 'deadline'));
  }

  const remaining = deadline ? deadline.remaining() : Number.POSITIVE_INFINITY;
  const budget = Math.min(timeoutMs, remaining);
  const timerReason = budget < timeoutMs ? 'deadline' : 'stage';
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      deadline?.signal.removeEventListener('abort', onDeadline);
      settle();
    };

    const onDeadline = () => {
      controller.abort();
      finish(() => reject(new StageTimeoutError(label, timeoutMs, 'deadline')));
    };

    const timer = setTimeout(() => {
      controller.abort();
      if (timerReason === 'deadline') deadline?.expire();
      finish(() => reject(new StageTimeoutError(label, timeoutMs, timerReason)));
    }, budget);

    deadline?.signal.addEventListener('abort', onDeadline, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }

    pending.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
