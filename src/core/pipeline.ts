/**
 * Resolution pipeline.
 *
 * resolve() normalizes and fingerprints the link, then (coalesced per
 * fingerprint) checks the cache, fetches the gate page and runs the strategy
 * chain against it. A strategy that lands on another gate sends the pipeline
 * round again on that page, up to the hop limit. Everything below runs under
 * one time budget.
 */

import {
  FetchError,
  LinkthruError,
  PipelineError,
  STRATEGY_IDS,
  StrategyError,
  type FetchResult,
  type PipelineErrorKind,
  type ResolutionRequest,
  type ResolutionResult,
  type StrategyAttempt,
  type StrategyId,
  type StrategyName,
  type StrategyOutcome,
} from '../types.js';
import { Budget, isBudgetExceeded } from './budget.js';
import { LinkCache, createLinkCache } from './cache.js';
import { DEFAULT_CONFIG, loadConfig, type EngineConfig } from './config.js';
import { fingerprint, parseSourceUrl } from './fingerprint.js';
import { HttpFetcher, type Fetcher } from './http-fetch.js';
import { PlaywrightBrowserDriver, type BrowserDriver } from './browser-pool.js';
import { SiteRegistry } from './site-registry.js';
import { STRATEGIES } from './strategies/index.js';
import type { Strategy, StrategyContext } from './strategies/types.js';
import { hostOf } from './strategies/shared.js';
import { debug, errorMessage, warn } from './log.js';

export interface ResolveOptions {
  /** Total time budget (ms); defaults to config.requestTimeoutMs */
  budgetMs?: number;
  maxHops?: number;
  /** Strategy allowlist; defaults to the site registry's list for the domain */
  strategies?: Iterable<StrategyId>;
  /** Skip the cache lookup and write */
  noCache?: boolean;
  signal?: AbortSignal;
}

export interface ResolverDeps {
  config?: Partial<EngineConfig>;
  fetcher?: Fetcher;
  /** null disables caching (and coalescing) */
  cache?: LinkCache | null;
  /** null disables browser automation */
  browser?: BrowserDriver | null;
  strategies?: readonly Strategy[];
  sites?: SiteRegistry;
}

export interface ResolverStats {
  /** resolve() calls that reached the pipeline */
  attempts: number;
  resolved: number;
  cacheHits: number;
  failures: number;
  strategyWins: Partial<Record<StrategyName, number>>;
}

export const UNRESOLVED_MESSAGE = 'Could not resolve this link';

// ── Requests ──────────────────────────────────────────────────────────────────

export function createRequest(
  url: string,
  options: Pick<ResolveOptions, 'budgetMs' | 'maxHops' | 'strategies'> = {},
  config: Pick<EngineConfig, 'requestTimeoutMs' | 'maxHops'> = DEFAULT_CONFIG,
  sites?: SiteRegistry,
): ResolutionRequest {
  const source = url.trim();
  parseSourceUrl(source);
  const budgetMs = options.budgetMs ?? config.requestTimeoutMs;
  if (!Number.isFinite(budgetMs) || budgetMs <= 0) {
    throw new LinkthruError(`Budget must be a positive number of milliseconds, got ${budgetMs}`, 'INVALID_OPTION');
  }
  const maxHops = options.maxHops ?? config.maxHops;
  if (!Number.isInteger(maxHops) || maxHops < 1) {
    throw new LinkthruError(`maxHops must be a positive integer, got ${maxHops}`, 'INVALID_OPTION');
  }

  const strategies = options.strategies
    ? new Set(options.strategies)
    : new Set(sites?.strategiesFor(source) ?? STRATEGY_IDS);

  return Object.freeze({ url: source, budgetMs, maxHops, strategies });
}

/** Throw a PipelineError for an unresolved result; pass a resolved one through. */
export function assertResolved(result: ResolutionResult): ResolutionResult & { destination: string } {
  const { destination } = result;
  if (destination === null) {
    const error = result.error ?? { kind: 'all-strategies-declined' as const, message: UNRESOLVED_MESSAGE };
    throw new PipelineError(error.kind, error.message, result.attempts);
  }
  return { ...result, destination };
}

// ── Pipeline stages ───────────────────────────────────────────────────────────

/** Mutable state threaded through the stages of one resolution. */
interface ResolutionContext {
  request: ResolutionRequest;
  fingerprint: string;
  budget: Budget;
  attempts: StrategyAttempt[];
  /** Hosts of the requested link and of every gate link followed since */
  visited: Set<string>;
  hops: number;
}

type ChainOutcome =
  | { kind: 'resolved'; strategy: StrategyName; nextUrl: string; hops: number }
  | { kind: 'exhausted' }
  | { kind: 'declined'; budgetSkipped: boolean };

function outcomeFromError(error: unknown, budget: Budget): StrategyOutcome {
  if (isBudgetExceeded(error) || (budget.exhausted && error instanceof Error && error.name === 'AbortError')) {
    return { kind: 'failed', errorKind: 'budget-exceeded', detail: errorMessage(error) };
  }
  if (error instanceof FetchError || error instanceof StrategyError) {
    return { kind: 'failed', errorKind: error.kind, detail: error.message };
  }
  if (!(error instanceof LinkthruError)) {
    warn('strategy threw unexpectedly:', error);
  }
  return { kind: 'failed', errorKind: 'parse-failed', detail: errorMessage(error) };
}

function describeOutcome(outcome: StrategyOutcome): string | undefined {
  switch (outcome.kind) {
    case 'resolved':
      return outcome.nextUrl;
    case 'declined':
      return outcome.reason;
    case 'failed':
      return `${outcome.errorKind}: ${outcome.detail}`;
  }
}

export class Resolver {
  readonly config: EngineConfig;
  readonly sites: SiteRegistry;
  private readonly fetcher: Fetcher;
  private readonly cache: LinkCache | null;
  private readonly browser: BrowserDriver | null;
  private readonly strategies: readonly Strategy[];
  private counters: ResolverStats = { attempts: 0, resolved: 0, cacheHits: 0, failures: 0, strategyWins: {} };

  constructor(deps: ResolverDeps = {}) {
    this.config = { ...loadConfig(), ...deps.config };
    this.sites = deps.sites ?? SiteRegistry.loadDefault();
    this.fetcher = deps.fetcher ?? new HttpFetcher({
      timeoutMs: this.config.fetchTimeoutMs,
      maxRedirects: this.config.maxRedirects,
      allowPrivateHosts: this.config.allowPrivateHosts,
    });
    this.cache = deps.cache === undefined
      ? createLinkCache({
        redisUrl: this.config.redisUrl,
        maxEntries: this.config.cacheMaxEntries,
        ttlMs: this.config.cacheTtlMs,
        refreshOnHit: this.config.cacheRefreshOnHit,
      })
      : deps.cache;
    this.browser = deps.browser === undefined
      ? new PlaywrightBrowserDriver({
        size: this.config.browserPoolSize,
        headless: this.config.browserHeadless,
        executablePath: this.config.browserExecutablePath,
      })
      : deps.browser;
    this.strategies = deps.strategies ?? STRATEGIES;
  }

  /**
   * Resolve a gate link. Invalid input throws InvalidUrlError; every other
   * failure comes back as a result with `destination: null` and `error` set.
   */
  async resolve(input: string | ResolutionRequest, options: ResolveOptions = {}): Promise<ResolutionResult> {
    const request = typeof input === 'string'
      ? createRequest(input, options, this.config, this.sites)
      : createRequest(input.url, { budgetMs: input.budgetMs, maxHops: input.maxHops, strategies: input.strategies });
    const fp = fingerprint(request.url);
    this.counters.attempts++;

    if (!this.cache || options.noCache) {
      return this.run(request, fp, options);
    }

    // A caller that joins an in-flight resolution still answers within its own budget.
    const waitBudget = new Budget(request.budgetMs, options.signal);
    try {
      const { value, shared } = await this.cache.coalesce(
        fp,
        () => this.run(request, fp, options),
        (pending) => waitBudget.race(pending),
      );
      return shared ? { ...value, shared: true, attempts: value.attempts.map((a) => ({ ...a })) } : value;
    } catch (e) {
      if (!isBudgetExceeded(e)) throw e;
      this.counters.failures++;
      return this.failure(
        { request, fingerprint: fp, budget: waitBudget, attempts: [], visited: new Set(), hops: 0 },
        'budget-exhausted',
      );
    } finally {
      waitBudget.dispose();
    }
  }

  stats(): ResolverStats {
    return { ...this.counters, strategyWins: { ...this.counters.strategyWins } };
  }

  async close(): Promise<void> {
    await this.cache?.close();
    await this.browser?.close();
  }

  private async run(request: ResolutionRequest, fp: string, options: ResolveOptions): Promise<ResolutionResult> {
    const budget = new Budget(request.budgetMs, options.signal);
    const ctx: ResolutionContext = {
      request,
      fingerprint: fp,
      budget,
      attempts: [],
      visited: new Set([hostOf(request.url)]),
      hops: 0,
    };

    try {
      if (this.cache && !options.noCache) {
        const cached = await this.cache.get(fp);
        if (cached) {
          this.counters.cacheHits++;
          this.counters.resolved++;
          debug('cache hit:', fp, '→', cached.destination);
          return this.result(ctx, { destination: cached.destination, strategy: cached.strategy, provenance: 'cache' });
        }
      }

      const result = await this.follow(ctx);
      if (result.destination !== null) {
        this.counters.resolved++;
        if (this.cache && !options.noCache) {
          await this.cache.put(fp, result.destination, { source: request.url, strategy: result.strategy });
        }
      } else {
        this.counters.failures++;
      }
      return result;
    } finally {
      budget.dispose();
    }
  }

  /** Fetch each gate page in turn and run the chain on it until a non-gate URL comes out. */
  private async follow(ctx: ResolutionContext): Promise<ResolutionResult> {
    let url = ctx.request.url;
    let gateHops = 0;

    while (true) {
      const page = await this.fetchGate(ctx, url);
      if (page === 'exhausted') return this.failure(ctx, 'budget-exhausted');

      const outcome = await this.runChain(ctx, url, page);

      if (outcome.kind === 'exhausted') return this.failure(ctx, 'budget-exhausted');
      if (outcome.kind === 'declined') {
        return this.failure(ctx, outcome.budgetSkipped ? 'budget-exhausted' : 'all-strategies-declined');
      }

      ctx.hops += outcome.hops;
      if (!this.isGateLink(ctx, outcome.nextUrl)) {
        return this.result(ctx, { destination: outcome.nextUrl, strategy: outcome.strategy, provenance: 'fresh' });
      }

      if (gateHops >= ctx.request.maxHops) return this.failure(ctx, 'hop-limit-exceeded');
      gateHops++;
      debug(`hop ${gateHops}: ${outcome.strategy} led to another gate, following ${outcome.nextUrl}`);
      ctx.visited.add(hostOf(outcome.nextUrl));
      url = outcome.nextUrl;
    }
  }

  /** The gate page, null when it could not be fetched, or 'exhausted'. */
  private async fetchGate(ctx: ResolutionContext, url: string): Promise<FetchResult | null | 'exhausted'> {
    const { budget } = ctx;
    try {
      return await budget.race(this.fetcher.fetch(url, {
        timeoutMs: budget.clamp(this.config.fetchTimeoutMs),
        signal: budget.signal,
      }));
    } catch (e) {
      if (isBudgetExceeded(e) || budget.exhausted) return 'exhausted';
      debug(`gate fetch failed for ${url}, continuing with URL-only strategies:`, errorMessage(e));
      return null;
    }
  }

  private async runChain(ctx: ResolutionContext, url: string, page: FetchResult | null): Promise<ChainOutcome> {
    const { budget, request } = ctx;
    const strategyCtx: StrategyContext = {
      request,
      url,
      page,
      fetcher: this.fetcher,
      budget,
      browser: this.browser,
      sites: this.sites,
      config: this.config,
    };
    let budgetSkipped = false;

    for (const strategy of this.strategies) {
      if (!request.strategies.has(strategy.id)) continue;
      if (budget.exhausted) return { kind: 'exhausted' };

      const startedAt = Date.now();
      let outcome: StrategyOutcome;
      if (strategy.minCostMs > budget.remainingMs()) {
        outcome = { kind: 'declined', reason: 'budget-exceeded' };
        budgetSkipped = true;
      } else if (strategy.requiresPage && !page) {
        outcome = { kind: 'declined', reason: 'page unavailable' };
      } else {
        try {
          outcome = await budget.race(strategy.attempt(strategyCtx));
        } catch (e) {
          outcome = outcomeFromError(e, budget);
        }
      }

      const attempt: StrategyAttempt = {
        strategy: strategy.name,
        url,
        outcome: outcome.kind,
        detail: describeOutcome(outcome),
        elapsedMs: Date.now() - startedAt,
      };
      ctx.attempts.push(attempt);
      debug(`${strategy.name} ${outcome.kind} on ${url} (${attempt.elapsedMs}ms): ${attempt.detail ?? ''}`);

      if (outcome.kind === 'resolved') {
        this.counters.strategyWins[strategy.name] = (this.counters.strategyWins[strategy.name] ?? 0) + 1;
        return { kind: 'resolved', strategy: strategy.name, nextUrl: outcome.nextUrl, hops: outcome.hops ?? 1 };
      }
      if (outcome.kind === 'failed' && outcome.errorKind === 'budget-exceeded') {
        return { kind: 'exhausted' };
      }
    }
    return { kind: 'declined', budgetSkipped };
  }

  /** A registered gate domain or a host this resolution already passed through. */
  private isGateLink(ctx: ResolutionContext, url: string): boolean {
    const host = hostOf(url);
    return ctx.visited.has(host) || this.sites.isGateHost(host);
  }

  private result(
    ctx: ResolutionContext,
    found: { destination: string; strategy: StrategyName | null; provenance: 'cache' | 'fresh' },
  ): ResolutionResult {
    return {
      source: ctx.request.url,
      fingerprint: ctx.fingerprint,
      destination: found.destination,
      strategy: found.strategy,
      hops: ctx.hops,
      elapsedMs: ctx.budget.elapsedMs(),
      provenance: found.provenance,
      shared: false,
      attempts: ctx.attempts,
    };
  }

  private failure(ctx: ResolutionContext, kind: PipelineErrorKind): ResolutionResult {
    const messages: Record<PipelineErrorKind, string> = {
      'all-strategies-declined': UNRESOLVED_MESSAGE,
      'budget-exhausted': `${UNRESOLVED_MESSAGE}: time budget of ${ctx.request.budgetMs}ms exhausted`,
      'hop-limit-exceeded': `${UNRESOLVED_MESSAGE}: more than ${ctx.request.maxHops} gate hops`,
    };
    return {
      source: ctx.request.url,
      fingerprint: ctx.fingerprint,
      destination: null,
      strategy: null,
      hops: ctx.hops,
      elapsedMs: ctx.budget.elapsedMs(),
      provenance: 'fresh',
      shared: false,
      attempts: ctx.attempts,
      error: { kind, message: messages[kind] },
    };
  }
}
