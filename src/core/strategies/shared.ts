/**
 * Helpers shared by the strategies: URL checks, markup scanning and
 * budget-bounded fetching.
 */

import * as cheerio from 'cheerio';
import type { FetchResult } from '../../types.js';
import type { FetchOptions } from '../http-fetch.js';
import type { StrategyContext } from './types.js';

export type CheerioRoot = ReturnType<typeof cheerio.load>;

export function load(html: string): CheerioRoot {
  return cheerio.load(html);
}

// ── URLs ──────────────────────────────────────────────────────────────────────

/** `value` as an absolute http(s) URL, or null. */
export function asHttpUrl(value: string): string | null {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : null;
  } catch {
    return null;
  }
}

/** Resolve `href` against `base`; null for non-http(s) targets such as javascript: or #. */
export function toAbsolute(href: string | undefined, base: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith('#') || /^(javascript|mailto|tel|data):/i.test(trimmed)) return null;
  try {
    return asHttpUrl(new URL(trimmed, base).href);
  } catch {
    return null;
  }
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/** True when `candidate` lives on a different host from the gate page. */
export function isOffGate(candidate: string, pageUrl: string): boolean {
  const host = hostOf(candidate);
  return host !== '' && host !== hostOf(pageUrl);
}

/** Social, ad and CDN hosts that gate pages link to but never lead anywhere useful. */
const EXCLUDED_HOSTS: readonly string[] = [
  'facebook.com',
  'twitter.com',
  'x.com',
  'instagram.com',
  'google.com',
  'googleapis.com',
  'gstatic.com',
  'googlesyndication.com',
  'doubleclick.net',
  'youtube.com',
  'tiktok.com',
  'pinterest.com',
  'linkedin.com',
  'reddit.com',
  't.me',
  'telegram.me',
  'whatsapp.com',
  'cloudflare.com',
  'jquery.com',
  'jsdelivr.net',
];

export function isExcludedHost(url: string): boolean {
  const host = hostOf(url);
  return EXCLUDED_HOSTS.some((excluded) => host === excluded || host.endsWith(`.${excluded}`));
}

/** An off-gate, non-excluded absolute URL. */
export function isDestinationCandidate(candidate: string | null, pageUrl: string): candidate is string {
  return candidate !== null && isOffGate(candidate, pageUrl) && !isExcludedHost(candidate);
}

// ── Markup ────────────────────────────────────────────────────────────────────

/** Words that mark the "real" link on a gate page. */
export const LINK_MARKER = /\b(get[-_ ]?link|go[-_ ]?link|skip|continue|proceed|download|real[-_ ]?link|final|destination|btn[-_ ]?go|open[-_ ]?link)\b/i;

/** Text of every inline (non-src) script. */
export function inlineScripts($: CheerioRoot): string[] {
  return $('script:not([src])')
    .toArray()
    .map((el) => $(el).text())
    .filter((text) => text.trim() !== '');
}

/** Undo JS string escapes that gate scripts use to hide URLs. */
export function unescapeJs(value: string): string {
  return value
    .replace(/\\x([0-9a-f]{2})/gi, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\u([0-9a-f]{4})/gi, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\\//g, '/');
}

/**
 * Raw query and fragment values of a URL, still percent-encoded. URLSearchParams
 * would decode them (and turn '+' into a space, which corrupts base64).
 */
export function rawParamValues(url: string): string[] {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return [];
  }
  const values: string[] = [];
  for (const part of [parsed.search.slice(1), parsed.hash.slice(1)]) {
    if (!part) continue;
    for (const pair of part.split('&')) {
      const eq = pair.indexOf('=');
      const value = eq === -1 ? pair : pair.slice(eq + 1);
      if (value) values.push(value);
    }
  }
  return values;
}

// ── Fetching ──────────────────────────────────────────────────────────────────

/** Fetch through the context's fetcher, bounded by what is left of the budget. */
export function fetchWithin(ctx: StrategyContext, url: string, options: FetchOptions = {}): Promise<FetchResult> {
  return ctx.budget.race(
    ctx.fetcher.fetch(url, {
      ...options,
      timeoutMs: ctx.budget.clamp(options.timeoutMs ?? ctx.config.fetchTimeoutMs),
      signal: ctx.budget.signal,
    }),
  );
}
