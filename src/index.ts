/**
 * linkthru - resolve ad-gate shortlinks to their destination
 *
 * Main library export
 */

import { Resolver, type ResolveOptions, type ResolverDeps } from './core/pipeline.js';
import { closePool } from './core/http-fetch.js';
import type { ResolutionResult } from './types.js';

export * from './types.js';
export { Resolver, createRequest, assertResolved, UNRESOLVED_MESSAGE } from './core/pipeline.js';
export type { ResolveOptions, ResolverDeps, ResolverStats } from './core/pipeline.js';
export { LinkCache, MemoryCacheStore, RedisCacheStore, createLinkCache, createRedisClient } from './core/cache.js';
export type { CacheStore, CacheStats, LinkCacheOptions, RedisClientLike } from './core/cache.js';
export { SiteRegistry, parseStrategyList, type SiteEntry } from './core/site-registry.js';
export { HttpFetcher, closePool, type Fetcher, type FetchOptions } from './core/http-fetch.js';
export { SessionPool, PlaywrightBrowserDriver } from './core/browser-pool.js';
export type { BrowserDriver, BrowserSession, SessionFactory, AcquireOptions } from './core/browser-pool.js';
export { Budget } from './core/budget.js';
export { fingerprint, normalizeUrl, fingerprintDigest } from './core/fingerprint.js';
export { detectChallenge, type ChallengeDetectionResult } from './core/challenge-detection.js';
export { loadConfig, DEFAULT_CONFIG, type EngineConfig } from './core/config.js';
export { STRATEGIES, getStrategy, type Strategy, type StrategyContext } from './core/strategies/index.js';

let defaultResolver: Resolver | null = null;

/** New resolver; whatever `deps` leaves out comes from the environment and the bundled site list. */
export function createResolver(deps: ResolverDeps = {}): Resolver {
  return new Resolver(deps);
}

/**
 * Resolve a gate link with the shared default resolver.
 *
 * @example
 * ```typescript
 * import { resolveLink } from 'linkthru';
 *
 * const result = await resolveLink('https://gate.example/abc123');
 * console.log(result.destination, result.strategy);
 * ```
 */
export async function resolveLink(url: string, options: ResolveOptions = {}): Promise<ResolutionResult> {
  defaultResolver ??= createResolver();
  return defaultResolver.resolve(url, options);
}

/** Close the default resolver's browser and cache, and the HTTP connection pool. */
export async function cleanup(): Promise<void> {
  const resolver = defaultResolver;
  defaultResolver = null;
  await resolver?.close();
  await closePool();
}
