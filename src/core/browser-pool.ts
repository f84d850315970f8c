/**
 * Browser driver: a bounded pool of headless Chromium sessions.
 *
 * One shared browser process (relaunched if it disconnects); each session is
 * an isolated context with a single page. At most `size` sessions are live;
 * further acquires wait in FIFO order until a session is released or
 * destroyed, or until their timeout/abort signal fires.
 */

import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { LinkthruError, StrategyError } from '../types.js';
import { getRealisticUserAgent } from './user-agents.js';
import { abortError } from './http-fetch.js';
import { debug, errorMessage } from './log.js';

export interface BrowserSession {
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Wait for network quiet; gives up silently after `timeoutMs` */
  waitForIdle(timeoutMs: number): Promise<void>;
  /** Evaluate a script in the page; the value is untyped JSON */
  evaluate(script: string): Promise<unknown>;
  /** Click the first visible match. False when nothing clickable matched. */
  click(selector: string, timeoutMs: number): Promise<boolean>;
  scroll(): Promise<void>;
  currentUrl(): string;
  content(): Promise<string>;
  /** True once the page or its browser has crashed */
  readonly crashed: boolean;
  close(): Promise<void>;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface BrowserDriver {
  acquire(options?: AcquireOptions): Promise<BrowserSession>;
  /** Return a healthy session to the pool */
  release(session: BrowserSession): Promise<void>;
  /** Discard a session that failed, crashed or was cancelled */
  destroy(session: BrowserSession): Promise<void>;
  close(): Promise<void>;
}

// ── Generic session pool ──────────────────────────────────────────────────────

export interface SessionFactory<T> {
  create(): Promise<T>;
  destroy(session: T): Promise<void>;
}

interface Waiter<T> {
  /** False when the waiter already gave up; the caller keeps the session. */
  resolve(session: T): boolean;
  reject(error: Error): void;
}

export class SessionPool<T> {
  private readonly idle: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private live = 0;
  private closed = false;

  constructor(private readonly factory: SessionFactory<T>, readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new LinkthruError(`Browser pool size must be a positive integer, got ${size}`, 'INVALID_CONFIG');
    }
  }

  /** Sessions that exist right now, idle or checked out. */
  get liveSessions(): number {
    return this.live;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(options: AcquireOptions = {}): Promise<T> {
    if (this.closed) throw new LinkthruError('Browser pool is closed', 'POOL_CLOSED');
    if (options.signal?.aborted) throw abortError();

    const idle = this.idle.shift();
    if (idle !== undefined) return idle;

    if (this.live < this.size) {
      const session = await this.createSession();
      // The caller stopped waiting while the session was starting.
      if (options.signal?.aborted) {
        await this.destroy(session);
        throw abortError();
      }
      return session;
    }
    return this.wait(options);
  }

  async release(session: T): Promise<void> {
    if (this.closed) {
      await this.destroy(session);
      return;
    }
    for (let waiter = this.waiters.shift(); waiter; waiter = this.waiters.shift()) {
      if (waiter.resolve(session)) return;
    }
    this.idle.push(session);
  }

  async destroy(session: T): Promise<void> {
    const idx = this.idle.indexOf(session);
    if (idx !== -1) this.idle.splice(idx, 1);
    this.live--;
    try {
      await this.factory.destroy(session);
    } catch (e) {
      debug('session destroy failed:', errorMessage(e));
    }

    // The freed slot goes to the longest waiter.
    const waiter = this.waiters.shift();
    if (waiter && !this.closed) {
      void this.createSession()
        .then((fresh) => (waiter.resolve(fresh) ? undefined : this.release(fresh)))
        .catch((e: unknown) => waiter.reject(e instanceof Error ? e : new Error(String(e))));
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new LinkthruError('Browser pool is closed', 'POOL_CLOSED'));
    }
    const idle = this.idle.splice(0);
    await Promise.all(idle.map((session) => this.destroy(session)));
  }

  private async createSession(): Promise<T> {
    this.live++;
    try {
      return await this.factory.create();
    } catch (e) {
      this.live--;
      throw e;
    }
  }

  private wait(options: AcquireOptions): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        return true;
      };
      const onAbort = () => {
        if (settle()) reject(abortError());
      };
      const waiter: Waiter<T> = {
        resolve: (session) => {
          if (!settle()) return false;
          resolve(session);
          return true;
        },
        reject: (error) => {
          if (settle()) reject(error);
        },
      };

      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (settle()) {
            reject(new StrategyError('budget-exceeded', `No browser session free within ${options.timeoutMs}ms`));
          }
        }, options.timeoutMs);
      }
      options.signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}

// ── Playwright-backed sessions ────────────────────────────────────────────────

const LAUNCH_ARGS: readonly string[] = [
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--disable-dev-shm-usage',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-gpu',
  '--disable-extensions',
];

class PlaywrightSession implements BrowserSession {
  private pageCrashed = false;

  constructor(private readonly context: BrowserContext, private readonly page: Page) {
    page.on('crash', () => {
      this.pageCrashed = true;
    });
  }

  get crashed(): boolean {
    return this.pageCrashed || this.page.isClosed();
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async waitForIdle(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
    } catch (e) {
      if (this.crashed) throw e;
      debug('network never went idle:', errorMessage(e));
    }
  }

  async evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  async click(selector: string, timeoutMs: number): Promise<boolean> {
    const target = this.page.locator(selector).first();
    try {
      if (!(await target.isVisible())) return false;
      await target.click({ timeout: timeoutMs });
      return true;
    } catch (e) {
      if (this.crashed) throw e;
      debug(`click on ${selector} failed:`, errorMessage(e));
      return false;
    }
  }

  async scroll(): Promise<void> {
    await this.page.mouse.wheel(0, 800);
  }

  currentUrl(): string {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

export interface PlaywrightDriverOptions {
  size?: number;
  headless?: boolean;
  executablePath?: string;
}

export class PlaywrightBrowserDriver implements BrowserDriver {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private readonly pool: SessionPool<PlaywrightSession>;
  private readonly sessions = new Set<PlaywrightSession>();

  constructor(private readonly options: PlaywrightDriverOptions = {}) {
    this.pool = new SessionPool<PlaywrightSession>(
      {
        create: () => this.createSession(),
        destroy: (session) => {
          this.sessions.delete(session);
          return session.close();
        },
      },
      options.size ?? 2,
    );
  }

  async acquire(options?: AcquireOptions): Promise<BrowserSession> {
    const session = await this.pool.acquire(options);
    if (session.crashed) {
      await this.pool.destroy(session);
      this.sessions.delete(session);
      return this.acquire(options);
    }
    return session;
  }

  async release(session: BrowserSession): Promise<void> {
    const owned = this.owned(session);
    if (owned.crashed) {
      await this.destroy(owned);
      return;
    }
    await this.pool.release(owned);
  }

  async destroy(session: BrowserSession): Promise<void> {
    const owned = this.owned(session);
    this.sessions.delete(owned);
    await this.pool.destroy(owned);
  }

  async close(): Promise<void> {
    await this.pool.close();
    this.sessions.clear();
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close().catch((e: unknown) => debug('browser close failed:', errorMessage(e)));
    }
  }

  private owned(session: BrowserSession): PlaywrightSession {
    for (const candidate of this.sessions) {
      if (candidate === session) return candidate;
    }
    throw new LinkthruError('Session does not belong to this driver', 'FOREIGN_SESSION');
  }

  private async getBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) return this.browser;
    this.browser = null;

    this.launching ??= chromium
      .launch({
        headless: this.options.headless ?? true,
        executablePath: this.options.executablePath,
        args: [...LAUNCH_ARGS],
      })
      .finally(() => {
        this.launching = null;
      });
    this.browser = await this.launching;
    return this.browser;
  }

  private async createSession(): Promise<PlaywrightSession> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      userAgent: getRealisticUserAgent(),
      viewport: { width: 1366, height: 768 },
      locale: 'en-US',
    });
    const page = await context.newPage();
    const session = new PlaywrightSession(context, page);
    this.sessions.add(session);
    return session;
  }
}
