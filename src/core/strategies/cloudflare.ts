/**
 * Challenge pages in front of a gate. We replay the request with the client
 * hints a real Chrome sends plus whatever cookies the challenge set, backing
 * off between tries; once a clean page comes back the static extractors run
 * on it.
 */

import { FetchError, type FetchResult } from '../../types.js';
import type { Extractor, Strategy, StrategyContext } from './types.js';
import { declined, failed, resolved } from './types.js';
import { fetchWithin, isOffGate } from './shared.js';
import { detectChallenge } from '../challenge-detection.js';
import { cookieHeader } from '../http-fetch.js';
import { clientHintHeaders, getRealisticUserAgent } from '../user-agents.js';
import { debug } from '../log.js';
import { extractFormTarget } from './html-form.js';
import { extractVisibleLink } from './css-hidden.js';
import { extractScriptTarget } from './javascript.js';
import { extractBase64Target } from './base64-decode.js';
import { extractEncodedTarget } from './url-decode.js';

const CLEARED_PAGE_EXTRACTORS: readonly Extractor[] = [
  extractFormTarget,
  extractVisibleLink,
  extractScriptTarget,
  extractBase64Target,
  extractEncodedTarget,
];

export function backoffMs(attempt: number): number {
  return 1000 * 2 ** attempt;
}

/** Cookie jar as name → value; later Set-Cookie lines replace earlier ones. */
function mergeCookies(jar: Map<string, string>, setCookies: readonly string[]): void {
  for (const line of setCookies) {
    const pair = line.split(';')[0]?.trim() ?? '';
    const eq = pair.indexOf('=');
    if (eq > 0) jar.set(pair.slice(0, eq), pair.slice(eq + 1));
  }
}

function linkFromClearedPage(ctx: StrategyContext, cleared: FetchResult): string | null {
  if (isOffGate(cleared.url, ctx.url)) return cleared.url;
  for (const extract of CLEARED_PAGE_EXTRACTORS) {
    const link = extract(cleared.html, cleared.url);
    if (link) return link;
  }
  return null;
}

export const cloudflareStrategy: Strategy = {
  id: 'cloudflare',
  name: 'Cloudflare Bypass',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');

    const challenge = detectChallenge(page);
    if (!challenge.isChallenge) return declined('no challenge detected');
    debug(`cloudflare: ${challenge.details ?? 'challenge'} on ${page.url}`);

    const userAgent = getRealisticUserAgent();
    const jar = new Map<string, string>();
    mergeCookies(jar, page.cookies);

    for (let attempt = 0; attempt < ctx.config.cloudflareRetries; attempt++) {
      const delay = backoffMs(attempt);
      if (delay >= ctx.budget.remainingMs()) break;
      await ctx.budget.sleep(delay);

      const cookies = cookieHeader([...jar].map(([name, value]) => `${name}=${value}`));
      let retry: FetchResult;
      try {
        retry = await fetchWithin(ctx, page.url, {
          headers: {
            ...clientHintHeaders(userAgent),
            Referer: page.url,
            ...(cookies ? { Cookie: cookies } : {}),
          },
        });
      } catch (e) {
        if (!(e instanceof FetchError)) throw e;
        debug(`cloudflare: retry ${attempt + 1} failed:`, e.message);
        continue;
      }

      mergeCookies(jar, retry.cookies);
      if (detectChallenge(retry).isChallenge) continue;

      const link = linkFromClearedPage(ctx, retry);
      return link ? resolved(link) : declined('challenge cleared but the page holds no link');
    }

    return failed('challenge-unsolved', `still challenged after ${ctx.config.cloudflareRetries} retries`);
  },
};
