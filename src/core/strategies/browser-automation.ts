/**
 * Last resort: drive a real browser through the gate. Costly, so it runs last
 * and only when enough budget is left to get a session and load a page.
 */

import { StrategyError, type StrategyOutcome } from '../../types.js';
import type { BrowserSession } from '../browser-pool.js';
import type { Strategy, StrategyContext } from './types.js';
import { declined, failed, resolved } from './types.js';
import { isOffGate, load } from './shared.js';
import { pickBestAnchor } from './css-hidden.js';
import { isBudgetExceeded } from '../budget.js';
import { debug, errorMessage } from '../log.js';

/** Controls that reveal or follow the real link, tried in order. */
export const REVEAL_SELECTORS: readonly string[] = [
  '#get-link',
  '.get-link',
  '#skip',
  '.skip-btn',
  '#btn-go',
  'a.btn-go',
  '#continue',
  '.continue',
  'button:has-text("Get Link")',
  'a:has-text("Get Link")',
  'button:has-text("Continue")',
  'button:has-text("Skip")',
];

const COUNTDOWN_SCRIPT = `(() => {
  const el = document.querySelector('[id*="countdown"], [class*="countdown"], [id*="timer"], [class*="timer"]');
  if (!el) return null;
  const n = parseInt(el.textContent || '', 10);
  return Number.isFinite(n) ? n : null;
})()`;

const CRASH_MESSAGE = /crash|target (?:page, context or browser )?(?:has been )?closed|browser has been closed|disconnected/i;

async function drive(ctx: StrategyContext, session: BrowserSession): Promise<StrategyOutcome> {
  const { budget, config } = ctx;

  await budget.race(session.navigate(ctx.url, budget.clamp(config.browserTimeoutMs)));
  await budget.race(session.waitForIdle(budget.clamp(5_000)));

  const countdown = await budget.race(session.evaluate(COUNTDOWN_SCRIPT));
  if (typeof countdown === 'number' && countdown > 0) {
    const waitMs = Math.min(countdown * 1000 + 500, config.countdownMaxWaitMs, budget.remainingMs() - 1_000);
    if (waitMs > 0) await budget.sleep(waitMs);
  }

  for (const selector of REVEAL_SELECTORS) {
    if (await budget.race(session.click(selector, budget.clamp(2_000)))) {
      debug('browser: clicked', selector);
      await budget.race(session.waitForIdle(budget.clamp(3_000)));
      break;
    }
  }
  await budget.race(session.scroll());

  const landed = session.currentUrl();
  if (isOffGate(landed, ctx.url)) return resolved(landed);

  const html = await budget.race(session.content());
  const link = pickBestAnchor(load(html), landed);
  return link ? resolved(link) : declined('rendered page holds no off-gate link');
}

export const browserAutomationStrategy: Strategy = {
  id: 'browser-automation',
  name: 'Browser Automation',
  requiresPage: false,
  minCostMs: 3_000,

  async attempt(ctx) {
    if (!ctx.browser) return declined('no browser configured');
    const browser = ctx.browser;

    let session: BrowserSession;
    try {
      session = await ctx.budget.race(browser.acquire({ signal: ctx.budget.signal, timeoutMs: ctx.budget.remainingMs() }));
    } catch (e) {
      if (isBudgetExceeded(e) || ctx.budget.exhausted) {
        throw new StrategyError('budget-exceeded', 'No browser session before the budget ran out');
      }
      return failed('browser-crashed', `could not start a browser session: ${errorMessage(e)}`);
    }

    let outcome: StrategyOutcome;
    try {
      outcome = await drive(ctx, session);
    } catch (e) {
      await browser.destroy(session);
      if (isBudgetExceeded(e)) throw e;
      if (session.crashed || CRASH_MESSAGE.test(errorMessage(e))) {
        return failed('browser-crashed', errorMessage(e));
      }
      if (e instanceof Error && e.name === 'TimeoutError') {
        return failed('timeout', e.message);
      }
      return failed('connection-failed', errorMessage(e));
    }

    await browser.release(session);
    return outcome;
  },
};
