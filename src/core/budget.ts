/**
 * Per-request time budget.
 *
 * Owns an AbortSignal that fires at the deadline (or when the parent signal
 * aborts). Every network call, browser navigation and artificial wait inside a
 * resolution hangs off this signal.
 */

import { StrategyError } from '../types.js';

export class Budget {
  readonly startedAt: number;
  readonly deadline: number;
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly detachParent?: () => void;

  constructor(readonly totalMs: number, parent?: AbortSignal) {
    this.startedAt = Date.now();
    this.deadline = this.startedAt + totalMs;
    this.timer = setTimeout(() => this.controller.abort(), Math.max(0, totalMs));
    this.timer.unref();

    if (parent) {
      if (parent.aborted) {
        this.controller.abort();
      } else {
        const onAbort = () => this.controller.abort();
        parent.addEventListener('abort', onAbort, { once: true });
        this.detachParent = () => parent.removeEventListener('abort', onAbort);
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get exhausted(): boolean {
    return this.controller.signal.aborted || Date.now() >= this.deadline;
  }

  remainingMs(): number {
    if (this.controller.signal.aborted) return 0;
    return Math.max(0, this.deadline - Date.now());
  }

  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  /** Clamp a per-operation timeout to what is left of the budget. */
  clamp(timeoutMs: number): number {
    return Math.min(timeoutMs, this.remainingMs());
  }

  /** Throws when the budget is spent. */
  check(): void {
    if (this.exhausted) {
      throw budgetExceeded(this.totalMs);
    }
  }

  /** Cancellable wait. Rejects with a budget-exceeded StrategyError on abort. */
  sleep(ms: number): Promise<void> {
    return this.race(
      new Promise<void>((resolve) => {
        const onAbort = () => clearTimeout(timer);
        const timer = setTimeout(() => {
          this.signal.removeEventListener('abort', onAbort);
          resolve();
        }, ms);
        this.signal.addEventListener('abort', onAbort, { once: true });
      }),
    );
  }

  /**
   * Settle with `promise`, or reject as soon as the budget runs out,
   * whichever comes first. The losing promise is left to settle on its own.
   */
  race<T>(promise: Promise<T>): Promise<T> {
    if (this.exhausted) {
      promise.catch(() => {});
      return Promise.reject(budgetExceeded(this.totalMs));
    }
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(budgetExceeded(this.totalMs));
      this.signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        (value) => {
          this.signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.detachParent?.();
  }
}

function budgetExceeded(totalMs: number): StrategyError {
  return new StrategyError('budget-exceeded', `Resolution budget of ${totalMs}ms exhausted`);
}

export function isBudgetExceeded(error: unknown): boolean {
  return error instanceof StrategyError && error.kind === 'budget-exceeded';
}
