/**
 * Countdown gates ("please wait 10 seconds") usually ship the destination in
 * the page already; only when it cannot be read statically do we sit out the
 * timer and fetch the page again.
 */

import type { Strategy, StrategyContext } from './types.js';
import { declined, resolved } from './types.js';
import {
  LINK_MARKER,
  inlineScripts,
  isDestinationCandidate,
  isOffGate,
  load,
  toAbsolute,
  fetchWithin,
  type CheerioRoot,
} from './shared.js';
import { scriptNavigationTargets, extractScriptTarget } from './javascript.js';
import { extractVisibleLink, pickBestAnchor } from './css-hidden.js';
import { cookieHeader } from '../http-fetch.js';
import { debug } from '../log.js';

const TIMER_MARKER = /countdown|timer|wait|seconds/i;
const COUNTER_SCRIPT = /set(?:Timeout|Interval)\s*\(/;
const COUNTER_DECREMENT = /\b\w*(?:count|timer|sec|seconds|time|wait)\w*\s*(?:--|-=\s*1)/i;
const COUNTER_START = /\b(?:var|let|const)\s+\w*(?:count|timer|seconds|sec|wait|time)\w*\s*=\s*(\d+)/i;

export interface TimerInfo {
  /** Stated wait in seconds, when the page gives one */
  seconds: number | null;
}

function timerElements($: CheerioRoot) {
  return $('[id], [class]').toArray().filter((el) => {
    const $el = $(el);
    return TIMER_MARKER.test(`${$el.attr('id') ?? ''} ${$el.attr('class') ?? ''}`);
  });
}

export function detectTimer(html: string): TimerInfo | null {
  const $ = load(html);
  const elements = timerElements($);
  const scripts = inlineScripts($).join('\n');
  const scriptTimer = COUNTER_SCRIPT.test(scripts) && COUNTER_DECREMENT.test(scripts);
  if (elements.length === 0 && !scriptTimer) return null;

  let seconds: number | null = null;
  const start = scripts.match(COUNTER_START);
  if (start?.[1]) {
    seconds = parseInt(start[1], 10);
  } else {
    for (const el of elements) {
      const n = parseInt($(el).text().trim(), 10);
      if (Number.isFinite(n)) {
        seconds = n;
        break;
      }
    }
  }
  return { seconds };
}

/** Link the countdown would reveal, computed without waiting. */
export function extractCountdownTarget(html: string, pageUrl: string): string | null {
  const $ = load(html);
  const scripts = inlineScripts($);

  // 1. navigation inside a setTimeout callback
  for (const script of scripts) {
    for (const match of script.matchAll(/setTimeout\s*\(\s*(?:function\s*\([^)]*\)|\([^)]*\)\s*=>)\s*\{?([\s\S]*?)\}?\s*,\s*\d+\s*\)/g)) {
      for (const target of scriptNavigationTargets(match[1] ?? '')) {
        const absolute = toAbsolute(target, pageUrl);
        if (isDestinationCandidate(absolute, pageUrl)) return absolute;
      }
    }
  }

  // 2. a hidden element the script reveals by id
  const joined = scripts.join('\n');
  const revealed = [
    ...joined.matchAll(/getElementById\(\s*['"]([\w-]+)['"]\s*\)\s*\.(?:style\.(?:display|visibility)|removeAttribute\(\s*['"]hidden|classList\.remove)/g),
    ...joined.matchAll(/\$\(\s*['"]#([\w-]+)['"]\s*\)\s*\.(?:show|fadeIn|removeClass|css)\(/g),
  ];
  for (const match of revealed) {
    const $target = $(`#${match[1] ?? ''}`);
    const href = $target.is('a') ? $target.attr('href') : $target.find('a[href]').first().attr('href');
    const absolute = toAbsolute(href, pageUrl);
    if (isDestinationCandidate(absolute, pageUrl)) return absolute;
  }

  // 3. data attributes on the timer or its button
  for (const el of $('[data-url], [data-href], [data-link]').toArray()) {
    const $el = $(el);
    const absolute = toAbsolute($el.attr('data-url') ?? $el.attr('data-href') ?? $el.attr('data-link'), pageUrl);
    if (isDestinationCandidate(absolute, pageUrl)) return absolute;
  }
  return null;
}

async function waitAndRefetch(ctx: StrategyContext, waitMs: number): Promise<string | null> {
  const page = ctx.page;
  if (!page) return null;

  debug(`countdown: waiting ${waitMs}ms on ${ctx.url}`);
  await ctx.budget.sleep(waitMs);

  const cookies = cookieHeader(page.cookies);
  const after = await fetchWithin(ctx, page.url, {
    headers: { Referer: page.url, ...(cookies ? { Cookie: cookies } : {}) },
  });
  if (isOffGate(after.url, page.url)) return after.url;

  return extractScriptTarget(after.html, after.url) ??
    extractVisibleLink(after.html, after.url) ??
    extractCountdownTarget(after.html, after.url) ??
    pickBestAnchorIfMarked(after.html, after.url);
}

/** A visible off-gate anchor, but only when a link marker singles it out. */
function pickBestAnchorIfMarked(html: string, pageUrl: string): string | null {
  const $ = load(html);
  const marked = $('a[href]').toArray().filter((el) => {
    const $el = $(el);
    return LINK_MARKER.test(`${$el.attr('class') ?? ''} ${$el.attr('id') ?? ''} ${$el.text()}`);
  });
  if (marked.length === 0) return null;
  return pickBestAnchor($, pageUrl, (el) => !marked.includes(el));
}

export const countdownStrategy: Strategy = {
  id: 'countdown',
  name: 'Countdown Timer Bypass',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');

    const timer = detectTimer(page.html);
    if (!timer) return declined('no countdown on page');

    const target = extractCountdownTarget(page.html, page.url);
    if (target) return resolved(target);

    if (timer.seconds === null) return declined('countdown length unknown');
    const waitMs = timer.seconds * 1000;
    if (waitMs > ctx.config.countdownMaxWaitMs) {
      return declined(`countdown of ${timer.seconds}s exceeds the ${ctx.config.countdownMaxWaitMs}ms wait limit`);
    }
    if (waitMs >= ctx.budget.remainingMs()) {
      return declined(`countdown of ${timer.seconds}s does not fit the remaining budget`);
    }

    const revealed = await waitAndRefetch(ctx, waitMs);
    return revealed ? resolved(revealed) : declined('nothing revealed after the countdown');
  },
};
