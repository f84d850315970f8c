import type {
  FetchErrorKind,
  FetchResult,
  ResolutionRequest,
  StrategyErrorKind,
  StrategyId,
  StrategyName,
  StrategyOutcome,
} from '../../types.js';
import type { Budget } from '../budget.js';
import type { BrowserDriver } from '../browser-pool.js';
import type { EngineConfig } from '../config.js';
import type { Fetcher } from '../http-fetch.js';
import type { SiteRegistry } from '../site-registry.js';

/** Everything a strategy may look at or use for one attempt. */
export interface StrategyContext {
  request: ResolutionRequest;
  /** URL of the gate page for this hop */
  url: string;
  /** Fetched gate page; null when the fetch failed and only the URL is known */
  page: FetchResult | null;
  fetcher: Fetcher;
  budget: Budget;
  /** Null when no browser is configured */
  browser: BrowserDriver | null;
  sites: SiteRegistry;
  config: EngineConfig;
}

export interface Strategy {
  id: StrategyId;
  name: StrategyName;
  /** Declines up front when the page could not be fetched */
  requiresPage: boolean;
  /** Skipped when less budget than this remains */
  minCostMs: number;
  attempt(ctx: StrategyContext): Promise<StrategyOutcome>;
}

/** A pure scan of a page for the destination link. */
export type Extractor = (html: string, pageUrl: string) => string | null;

export function resolved(nextUrl: string, hops?: number): StrategyOutcome {
  return hops === undefined ? { kind: 'resolved', nextUrl } : { kind: 'resolved', nextUrl, hops };
}

export function declined(reason: string): StrategyOutcome {
  return { kind: 'declined', reason };
}

export function failed(errorKind: FetchErrorKind | StrategyErrorKind, detail: string): StrategyOutcome {
  return { kind: 'failed', errorKind, detail };
}
