/**
 * Browser automation against a scripted session; no browser is launched.
 */

import { describe, it, expect, vi } from 'vitest';
import { browserAutomationStrategy, REVEAL_SELECTORS } from '../core/strategies/browser-automation.js';
import type { BrowserDriver, BrowserSession } from '../core/browser-pool.js';
import { Budget } from '../core/budget.js';
import { StrategyError } from '../types.js';
import { makeContext, makePage } from './helpers.js';

const GATE = 'https://gate.example/b';

class ScriptedSession implements BrowserSession {
  crashed = false;
  readonly clicks: string[] = [];
  navigateError: Error | null = null;
  navigateHangs = false;

  constructor(private landedUrl: string, private html = '', private clickable: string | null = null) {}

  async navigate(): Promise<void> {
    if (this.navigateError) throw this.navigateError;
    if (this.navigateHangs) await new Promise<never>(() => {});
  }
  async waitForIdle(): Promise<void> {}
  async evaluate(): Promise<unknown> {
    return null;
  }
  async click(selector: string): Promise<boolean> {
    this.clicks.push(selector);
    return selector === this.clickable;
  }
  async scroll(): Promise<void> {}
  currentUrl(): string {
    return this.landedUrl;
  }
  async content(): Promise<string> {
    return this.html;
  }
  async close(): Promise<void> {}
}

function driver(session: BrowserSession) {
  return {
    acquire: vi.fn(async () => session),
    release: vi.fn(async (_s: BrowserSession) => {}),
    destroy: vi.fn(async (_s: BrowserSession) => {}),
    close: vi.fn(async () => {}),
  } satisfies BrowserDriver;
}

function run(browser: BrowserDriver | null) {
  return browserAutomationStrategy.attempt(makeContext(GATE, makePage(GATE, ''), { browser }));
}

describe('browser-automation — outcomes', () => {
  it('declines without a browser', async () => {
    expect(await run(null)).toEqual({ kind: 'declined', reason: 'no browser configured' });
  });

  it('resolves to where the page navigated and returns the session', async () => {
    const session = new ScriptedSession('https://real.example/landed');
    const browser = driver(session);

    expect(await run(browser)).toEqual({ kind: 'resolved', nextUrl: 'https://real.example/landed' });
    expect(browser.release).toHaveBeenCalledWith(session);
    expect(browser.destroy).not.toHaveBeenCalled();
  });

  it('stops clicking after the first control that responds', async () => {
    const session = new ScriptedSession('https://real.example/landed', '', '.get-link');
    await run(driver(session));
    expect(session.clicks).toEqual(REVEAL_SELECTORS.slice(0, 2));
  });

  it('falls back to the best link in the rendered page', async () => {
    const html = `<a href="https://gate.example/ads">Ads</a>
      <a href="https://one.example/a">Sponsor</a>
      <a class="get-link" href="https://real.example/rendered">Get Link</a>`;
    const outcome = await run(driver(new ScriptedSession(GATE, html)));
    expect(outcome).toEqual({ kind: 'resolved', nextUrl: 'https://real.example/rendered' });
  });

  it('declines and releases when the rendered page has nothing', async () => {
    const session = new ScriptedSession(GATE, '<p>still waiting</p>');
    const browser = driver(session);
    expect(await run(browser)).toEqual({ kind: 'declined', reason: 'rendered page holds no off-gate link' });
    expect(browser.release).toHaveBeenCalledWith(session);
  });
});

describe('browser-automation — failures', () => {
  it('reports a crash and destroys the session', async () => {
    const session = new ScriptedSession(GATE);
    session.navigateError = new Error('Target page, context or browser has been closed');
    const browser = driver(session);

    expect(await run(browser)).toEqual({
      kind: 'failed',
      errorKind: 'browser-crashed',
      detail: 'Target page, context or browser has been closed',
    });
    expect(browser.destroy).toHaveBeenCalledWith(session);
    expect(browser.release).not.toHaveBeenCalled();
  });

  it('maps navigation timeouts to timeout', async () => {
    const session = new ScriptedSession(GATE);
    const timeout = new Error('page.goto: Timeout 45000ms exceeded.');
    timeout.name = 'TimeoutError';
    session.navigateError = timeout;

    expect(await run(driver(session))).toMatchObject({ kind: 'failed', errorKind: 'timeout' });
  });

  it('reports a session that could not be started', async () => {
    const browser = driver(new ScriptedSession(GATE));
    browser.acquire.mockRejectedValueOnce(new Error('launch failed'));

    expect(await run(browser)).toEqual({
      kind: 'failed',
      errorKind: 'browser-crashed',
      detail: 'could not start a browser session: launch failed',
    });
  });

  it('gives up on a hung navigation when the budget runs out and destroys the session', async () => {
    const session = new ScriptedSession(GATE);
    session.navigateHangs = true;
    const browser = driver(session);
    const budget = new Budget(100);

    try {
      const ctx = makeContext(GATE, makePage(GATE, ''), { browser, budget });
      const error = await browserAutomationStrategy.attempt(ctx).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StrategyError);
      expect(error).toMatchObject({ kind: 'budget-exceeded' });
      expect(browser.destroy).toHaveBeenCalledWith(session);
      expect(browser.release).not.toHaveBeenCalled();
    } finally {
      budget.dispose();
    }
  });
});
