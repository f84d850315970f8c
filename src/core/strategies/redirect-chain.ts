import type { FetchResult } from '../../types.js';
import type { Strategy } from './types.js';
import { declined, resolved } from './types.js';
import { LINK_MARKER, fetchWithin, inlineScripts, isOffGate, load, toAbsolute } from './shared.js';
import { scriptNavigationTargets } from './javascript.js';
import { cookieHeader, getHeader } from '../http-fetch.js';

function refreshTarget(value: string | undefined, base: string): string | null {
  const match = value?.match(/^\s*\d*\s*[;,]?\s*url\s*=\s*['"]?([^'"\s]+)/i);
  return match?.[1] ? toAbsolute(match[1], base) : null;
}

/** Where a page sends the visitor next, if anywhere. */
export function nextHop(page: Pick<FetchResult, 'url' | 'html' | 'headers'>): string | null {
  const $ = load(page.html);

  const refreshMeta = $('meta[http-equiv]').toArray()
    .find((el) => ($(el).attr('http-equiv') ?? '').toLowerCase() === 'refresh');
  const meta = refreshMeta ? refreshTarget($(refreshMeta).attr('content'), page.url) : null;
  if (meta) return meta;

  const header = refreshTarget(getHeader(page, 'refresh'), page.url);
  if (header) return header;

  for (const script of inlineScripts($)) {
    for (const target of scriptNavigationTargets(script)) {
      const absolute = toAbsolute(target, page.url);
      if (absolute && absolute !== page.url) return absolute;
    }
  }

  // A page whose only way forward is one link.
  const anchors = $('a[href]').toArray().flatMap((el) => {
    const href = toAbsolute($(el).attr('href'), page.url);
    return href && href !== page.url ? [{ el, href }] : [];
  });
  if (anchors.length === 1) return anchors[0]?.href ?? null;
  const marked = anchors.filter(({ el }) => LINK_MARKER.test(`${$(el).attr('class') ?? ''} ${$(el).attr('id') ?? ''} ${$(el).text()}`));
  return marked.length === 1 ? marked[0]?.href ?? null : null;
}

export const redirectChainStrategy: Strategy = {
  id: 'redirect-chain',
  name: 'Redirect Chain',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');

    if (page.redirects.length > 0 && isOffGate(page.url, ctx.url)) {
      return resolved(page.url, page.redirects.length);
    }

    let current = page;
    let hops = 0;
    while (hops < ctx.request.maxHops) {
      const next = nextHop(current);
      if (!next) {
        return declined(hops === 0 ? 'no redirect on page' : `redirect chain dead-ended at ${current.url}`);
      }
      hops++;
      if (isOffGate(next, ctx.url)) return resolved(next, hops);

      const cookies = cookieHeader(current.cookies);
      current = await fetchWithin(ctx, next, {
        headers: { Referer: current.url, ...(cookies ? { Cookie: cookies } : {}) },
      });
      if (isOffGate(current.url, ctx.url)) {
        return resolved(current.url, hops + current.redirects.length);
      }
    }
    return declined(`redirect chain longer than ${ctx.request.maxHops} hops`);
  },
};
