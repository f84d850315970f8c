import { getEventListeners } from 'node:events';
import { describe, it, expect, afterEach } from 'vitest';
import { Budget, isBudgetExceeded } from '../core/budget.js';
import { StrategyError } from '../types.js';

const budgets: Budget[] = [];
function budget(ms: number, parent?: AbortSignal): Budget {
  const b = new Budget(ms, parent);
  budgets.push(b);
  return b;
}

afterEach(() => {
  for (const b of budgets.splice(0)) b.dispose();
});

describe('budget', () => {
  it('clamps timeouts to what is left', () => {
    const b = budget(1_000);
    expect(b.clamp(60_000)).toBeLessThanOrEqual(1_000);
    expect(b.clamp(10)).toBe(10);
  });

  it('aborts its signal at the deadline', async () => {
    const b = budget(30);
    await new Promise((r) => setTimeout(r, 60));
    expect(b.signal.aborted).toBe(true);
    expect(b.exhausted).toBe(true);
    expect(b.remainingMs()).toBe(0);
    expect(() => b.check()).toThrow(StrategyError);
  });

  it('rejects a sleep that outlasts the budget', async () => {
    const b = budget(50);
    const started = Date.now();
    const error = await b.sleep(5_000).catch((e: unknown) => e);
    expect(isBudgetExceeded(error)).toBe(true);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('leaves no abort listener behind after sleeps that finish', async () => {
    const b = budget(1_000);
    for (let i = 0; i < 3; i++) await b.sleep(5);
    expect(getEventListeners(b.signal, 'abort')).toHaveLength(0);
  });

  it('passes through a promise that settles in time', async () => {
    const b = budget(1_000);
    await expect(b.race(Promise.resolve('ok'))).resolves.toBe('ok');
    await expect(b.race(Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });

  it('follows its parent signal', () => {
    const parent = new AbortController();
    const b = budget(10_000, parent.signal);
    parent.abort();
    expect(b.signal.aborted).toBe(true);
  });

  it('rejects immediately once spent', async () => {
    const parent = new AbortController();
    parent.abort();
    const b = budget(10_000, parent.signal);
    const error = await b.race(new Promise(() => {})).catch((e: unknown) => e);
    expect(isBudgetExceeded(error)).toBe(true);
  });
});
