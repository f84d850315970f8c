import { FetchError } from '../../types.js';
import type { Strategy } from './types.js';
import { declined, failed, resolved } from './types.js';
import { asHttpUrl, fetchWithin, inlineScripts, isDestinationCandidate, load, toAbsolute } from './shared.js';
import { debug } from '../log.js';

const REQUEST_PATTERNS: readonly RegExp[] = [
  /\bfetch\(\s*(['"`])(.+?)\1/g,
  /\$\.ajax\(\s*\{[\s\S]*?\burl\s*:\s*(['"`])(.+?)\1/g,
  /\$\.(?:get|post|getJSON)\(\s*(['"`])(.+?)\1/g,
  /\baxios(?:\.(?:get|post))?\(\s*(['"`])(.+?)\1/g,
  /\.open\(\s*['"](?:GET|POST)['"]\s*,\s*(['"`])(.+?)\1/gi,
];

const API_PATH = /\/(?:api|ajax|xhr|links?|redirect|go|get|download|file)(?:[/?._-]|$)|\.(?:json|php)(?:[?#]|$)/i;
const LINK_KEYS = ['url', 'link', 'destination', 'download', 'file', 'href', 'redirect'] as const;
const MAX_ENDPOINTS = 3;

/** Secondary request URLs made by the page's inline scripts that look like API calls. */
export function findEndpoints(html: string, pageUrl: string): string[] {
  const endpoints: string[] = [];
  for (const script of inlineScripts(load(html))) {
    for (const pattern of REQUEST_PATTERNS) {
      for (const match of script.matchAll(pattern)) {
        const endpoint = toAbsolute(match[2], pageUrl);
        if (!endpoint || endpoints.includes(endpoint)) continue;
        const { pathname, search } = new URL(endpoint);
        if (API_PATH.test(pathname + search)) endpoints.push(endpoint);
      }
    }
  }
  return endpoints;
}

function linkFromObject(value: object): string | null {
  for (const key of LINK_KEYS) {
    if (key in value) {
      const candidate: unknown = Reflect.get(value, key);
      if (typeof candidate === 'string') {
        const url = asHttpUrl(candidate.trim());
        if (url) return url;
      }
    }
  }
  return null;
}

/** Link field from a JSON payload, looking one level into `data`. */
export function extractJsonLink(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null) return null;
  const direct = linkFromObject(payload);
  if (direct) return direct;
  if ('data' in payload && typeof payload.data === 'object' && payload.data !== null) {
    return linkFromObject(payload.data);
  }
  return null;
}

export const dynamicContentStrategy: Strategy = {
  id: 'dynamic-content',
  name: 'Dynamic Content',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');

    const endpoints = findEndpoints(page.html, page.url).slice(0, MAX_ENDPOINTS);
    if (endpoints.length === 0) return declined('no secondary requests found');

    let lastError: FetchError | null = null;
    for (const endpoint of endpoints) {
      try {
        const response = await fetchWithin(ctx, endpoint, {
          headers: {
            'Accept': 'application/json, text/plain, */*',
            'X-Requested-With': 'XMLHttpRequest',
            'Referer': page.url,
          },
        });
        let payload: unknown;
        try {
          payload = JSON.parse(response.html);
        } catch {
          debug('dynamic-content: non-JSON response from', endpoint);
          continue;
        }
        const link = extractJsonLink(payload);
        if (isDestinationCandidate(link, page.url)) return resolved(link);
      } catch (e) {
        if (!(e instanceof FetchError)) throw e;
        lastError = e;
        debug('dynamic-content: request failed:', endpoint, e.message);
      }
    }

    return lastError
      ? failed(lastError.kind, lastError.message)
      : declined('secondary responses held no link');
  },
};
