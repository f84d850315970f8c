/**
 * In-process stand-ins shared by the tests: canned pages, a routed fetcher
 * and a strategy context builder.
 */

import { FetchError, type FetchResult } from '../types.js';
import type { FetchOptions, Fetcher } from '../core/http-fetch.js';
import { abortError } from '../core/http-fetch.js';
import { Budget } from '../core/budget.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import { SiteRegistry } from '../core/site-registry.js';
import { createRequest } from '../core/pipeline.js';
import type { StrategyContext } from '../core/strategies/types.js';

export function makePage(url: string, html: string, overrides: Partial<FetchResult> = {}): FetchResult {
  return {
    requestedUrl: url,
    url,
    status: 200,
    headers: {},
    cookies: [],
    body: Buffer.from(html),
    html,
    redirects: [],
    elapsedMs: 1,
    ...overrides,
  };
}

type Route = FetchResult | Error | ((options: FetchOptions) => FetchResult);

/** Fetcher that answers from a route table; unknown URLs are 404s. */
export class FakeFetcher implements Fetcher {
  readonly calls: Array<{ url: string; options: FetchOptions }> = [];

  constructor(private readonly routes: Record<string, Route> = {}, private readonly delayMs = 0) {}

  route(url: string, route: Route): void {
    this.routes[url] = route;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    this.calls.push({ url, options });
    if (this.delayMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, this.delayMs);
        options.signal?.addEventListener('abort', () => {
          clearTimeout(timer);
          reject(abortError());
        }, { once: true });
      });
    }
    const route = this.routes[url];
    if (!route) throw new FetchError('http-status', `HTTP 404 Not Found for ${url}`, 404);
    if (route instanceof Error) throw route;
    return typeof route === 'function' ? route(options) : route;
  }

  callsTo(url: string): number {
    return this.calls.filter((c) => c.url === url).length;
  }
}

export function makeContext(url: string, page: FetchResult | null, overrides: Partial<StrategyContext> = {}): StrategyContext {
  return {
    request: createRequest(url),
    url,
    page,
    fetcher: new FakeFetcher(),
    budget: new Budget(10_000),
    browser: null,
    sites: new SiteRegistry(),
    config: { ...DEFAULT_CONFIG },
    ...overrides,
  };
}
