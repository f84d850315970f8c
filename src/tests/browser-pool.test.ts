import { describe, it, expect, vi } from 'vitest';
import { SessionPool, type SessionFactory } from '../core/browser-pool.js';
import { LinkthruError, StrategyError } from '../types.js';

interface FakeSession {
  id: number;
}

function factory() {
  let created = 0;
  const f = {
    create: vi.fn(async (): Promise<FakeSession> => ({ id: ++created })),
    destroy: vi.fn(async (_session: FakeSession) => {}),
  } satisfies SessionFactory<FakeSession>;
  return f;
}

/** A create() that stays pending until the test finishes it. */
function slowCreate(f: ReturnType<typeof factory>) {
  let finish: (session: FakeSession) => void = () => {};
  f.create.mockImplementationOnce(
    () =>
      new Promise<FakeSession>((resolve) => {
        finish = resolve;
      }),
  );
  return (session: FakeSession) => finish(session);
}

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

// ── acquire / release ────────────────────────────────────────────────────────

describe('browser-pool — acquire and release', () => {
  it('creates sessions up to the pool size', async () => {
    const f = factory();
    const pool = new SessionPool(f, 2);
    const a = await pool.acquire();
    const b = await pool.acquire();
    expect([a.id, b.id]).toEqual([1, 2]);
    expect(pool.liveSessions).toBe(2);
    expect(f.create).toHaveBeenCalledTimes(2);
  });

  it('reuses a released session', async () => {
    const f = factory();
    const pool = new SessionPool(f, 2);
    const a = await pool.acquire();
    await pool.release(a);
    expect(await pool.acquire()).toBe(a);
    expect(f.create).toHaveBeenCalledOnce();
  });

  it('makes extra callers wait and hands sessions over in FIFO order', async () => {
    const pool = new SessionPool(factory(), 1);
    const a = await pool.acquire();

    const order: string[] = [];
    const first = pool.acquire().then((s) => {
      order.push('first');
      return s;
    });
    const second = pool.acquire().then((s) => {
      order.push('second');
      return s;
    });
    expect(pool.pending).toBe(2);

    await pool.release(a);
    const got = await first;
    expect(got).toBe(a);
    await pool.release(got);
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(pool.liveSessions).toBe(1);
  });

  it('rejects a bad size', () => {
    expect(() => new SessionPool(factory(), 0)).toThrow(LinkthruError);
  });
});

// ── waiting ──────────────────────────────────────────────────────────────────

describe('browser-pool — waiting', () => {
  it('times out a waiter with budget-exceeded', async () => {
    const pool = new SessionPool(factory(), 1);
    await pool.acquire();

    const error = await pool.acquire({ timeoutMs: 20 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StrategyError);
    expect(error).toMatchObject({ kind: 'budget-exceeded', message: 'No browser session free within 20ms' });
    expect(pool.pending).toBe(0);
  });

  it('drops a waiter whose signal aborts', async () => {
    const pool = new SessionPool(factory(), 1);
    await pool.acquire();
    const controller = new AbortController();

    const waiting = pool.acquire({ signal: controller.signal });
    controller.abort();
    await expect(waiting).rejects.toMatchObject({ name: 'AbortError' });
    expect(pool.pending).toBe(0);
  });

  it('destroys a session that finished starting after its caller aborted', async () => {
    const f = factory();
    const finish = slowCreate(f);
    const pool = new SessionPool(f, 1);
    const controller = new AbortController();

    const acquiring = pool.acquire({ signal: controller.signal });
    controller.abort();
    finish({ id: 7 });

    await expect(acquiring).rejects.toMatchObject({ name: 'AbortError' });
    expect(f.destroy).toHaveBeenCalledWith({ id: 7 });
    expect(pool.liveSessions).toBe(0);
    expect((await pool.acquire()).id).toBe(1);
  });

  it('refuses an already aborted signal', async () => {
    const pool = new SessionPool(factory(), 1);
    await expect(pool.acquire({ signal: AbortSignal.abort() })).rejects.toMatchObject({ name: 'AbortError' });
  });
});

// ── destroy / close ──────────────────────────────────────────────────────────

describe('browser-pool — destroy and close', () => {
  it('replaces a destroyed session for the next waiter', async () => {
    const f = factory();
    const pool = new SessionPool(f, 1);
    const a = await pool.acquire();
    const waiting = pool.acquire();

    await pool.destroy(a);
    const b = await waiting;

    expect(f.destroy).toHaveBeenCalledWith(a);
    expect(b.id).toBe(2);
    expect(pool.liveSessions).toBe(1);
  });

  it('keeps the replacement idle when its waiter aborted while it started', async () => {
    const f = factory();
    const pool = new SessionPool(f, 1);
    const a = await pool.acquire();
    const controller = new AbortController();
    const waiting = pool.acquire({ signal: controller.signal }).catch((e: unknown) => e);

    const finish = slowCreate(f);
    await pool.destroy(a);
    controller.abort();
    expect(await waiting).toMatchObject({ name: 'AbortError' });

    finish({ id: 2 });
    await tick();

    expect(pool.liveSessions).toBe(1);
    expect(await pool.acquire()).toEqual({ id: 2 });
    expect(f.create).toHaveBeenCalledTimes(2);
  });

  it('frees the slot even when the factory fails to destroy', async () => {
    const f = factory();
    f.destroy.mockRejectedValueOnce(new Error('already gone'));
    const pool = new SessionPool(f, 1);
    await pool.destroy(await pool.acquire());
    expect(pool.liveSessions).toBe(0);
  });

  it('does not count a session whose creation failed', async () => {
    const f = factory();
    f.create.mockRejectedValueOnce(new Error('launch failed'));
    const pool = new SessionPool(f, 1);
    await expect(pool.acquire()).rejects.toThrow('launch failed');
    expect(pool.liveSessions).toBe(0);
    expect((await pool.acquire()).id).toBe(1);
  });

  it('rejects waiters and destroys idle sessions on close', async () => {
    const f = factory();
    const pool = new SessionPool(f, 2);
    const a = await pool.acquire();
    const b = await pool.acquire();
    await pool.release(a);
    const waiting = pool.acquire().catch((e: unknown) => e);
    // `a` was idle, so only this second caller queues.
    const queued = pool.acquire().catch((e: unknown) => e);

    await pool.close();

    expect(await waiting).toBe(a);
    expect(await queued).toMatchObject({ code: 'POOL_CLOSED' });
    await pool.release(b);
    expect(f.destroy).toHaveBeenCalledWith(b);
    await expect(pool.acquire()).rejects.toThrow('Browser pool is closed');
  });
});
