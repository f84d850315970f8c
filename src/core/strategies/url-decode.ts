import type { Strategy } from './types.js';
import { declined, resolved } from './types.js';
import { asHttpUrl, isOffGate, rawParamValues } from './shared.js';

const MAX_ROUNDS = 3;
const BODY_PARAM = /\b(?:url|link|redirect|dest|target|goto)=([^&"'\s<>]+)/gi;

/**
 * Percent-decode up to three times (gates double- and triple-encode). The
 * result counts only if decoding changed something and produced an absolute
 * http(s) URL.
 */
export function decodeNestedUrl(raw: string): string | null {
  let value = raw;
  for (let round = 0; round < MAX_ROUNDS && value.includes('%'); round++) {
    let next: string;
    try {
      next = decodeURIComponent(value);
    } catch {
      break;
    }
    if (next === value) break;
    value = next;
  }
  if (value === raw || !/^https?:\/\//i.test(value)) return null;
  return asHttpUrl(value);
}

export function findEncodedTarget(urls: readonly string[], html: string, gateUrl: string): string | null {
  const candidates = urls.flatMap(rawParamValues).filter((value) => value.includes('%'));
  for (const match of html.matchAll(BODY_PARAM)) {
    if (match[1]?.includes('%')) candidates.push(match[1]);
  }
  for (const candidate of candidates) {
    const decoded = decodeNestedUrl(candidate);
    if (decoded && isOffGate(decoded, gateUrl)) return decoded;
  }
  return null;
}

export function extractEncodedTarget(html: string, pageUrl: string): string | null {
  return findEncodedTarget([pageUrl], html, pageUrl);
}

export const urlDecodeStrategy: Strategy = {
  id: 'url-decode',
  name: 'URL Decode',
  requiresPage: false,
  minCostMs: 0,

  async attempt(ctx) {
    const urls = ctx.page && ctx.page.url !== ctx.url ? [ctx.url, ctx.page.url] : [ctx.url];
    const target = findEncodedTarget(urls, ctx.page?.html ?? '', ctx.url);
    return target ? resolved(target) : declined('no percent-encoded URL found');
  },
};
