import type { Strategy } from './types.js';
import { declined, resolved } from './types.js';
import { isOffGate, load, rawParamValues } from './shared.js';

const BASE64_TOKEN = /^[A-Za-z0-9+/_-]{8,}={0,2}$/;
const DECODED_URL = /^https?:\/\/[^\s"'<>]+$/i;

function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Decode a standard or URL-safe base64 token to an absolute http(s) URL. */
export function decodeBase64Url(raw: string): string | null {
  const token = percentDecode(raw.trim());
  if (!BASE64_TOKEN.test(token)) return null;

  const standard = token.replace(/-/g, '+').replace(/_/g, '/').replace(/=+$/, '');
  const padded = standard + '='.repeat((4 - (standard.length % 4)) % 4);
  const decoded = Buffer.from(padded, 'base64').toString('utf8').trim();
  if (!DECODED_URL.test(decoded)) return null;
  try {
    return new URL(decoded).href;
  } catch {
    return null;
  }
}

/** Base64-encoded candidates in data attributes and atob() calls. */
function pageTokens(html: string): string[] {
  const $ = load(html);
  const tokens: string[] = [];
  for (const el of $('[data-url], [data-link], [data-href]').toArray()) {
    const $el = $(el);
    for (const attr of ['data-url', 'data-link', 'data-href']) {
      const value = $el.attr(attr);
      if (value) tokens.push(value);
    }
  }
  for (const match of html.matchAll(/atob\(\s*(['"`])([A-Za-z0-9+/_=-]+)\1\s*\)/g)) {
    if (match[2]) tokens.push(match[2]);
  }
  return tokens;
}

/**
 * First base64 token that decodes to an off-gate URL: query and fragment
 * values of the given URLs first, then the page markup.
 */
export function findBase64Target(urls: readonly string[], html: string, gateUrl: string): string | null {
  const tokens = [...urls.flatMap(rawParamValues), ...pageTokens(html)];
  for (const token of tokens) {
    const decoded = decodeBase64Url(token);
    if (decoded && isOffGate(decoded, gateUrl)) return decoded;
  }
  return null;
}

export function extractBase64Target(html: string, pageUrl: string): string | null {
  return findBase64Target([pageUrl], html, pageUrl);
}

export const base64DecodeStrategy: Strategy = {
  id: 'base64-decode',
  name: 'Base64 Decode',
  requiresPage: false,
  minCostMs: 0,

  async attempt(ctx) {
    const urls = ctx.page && ctx.page.url !== ctx.url ? [ctx.url, ctx.page.url] : [ctx.url];
    const target = findBase64Target(urls, ctx.page?.html ?? '', ctx.url);
    return target ? resolved(target) : declined('no base64-encoded URL found');
  },
};
