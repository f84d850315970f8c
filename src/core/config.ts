/**
 * Engine configuration.
 *
 * Values come from LINKTHRU_* environment variables layered over defaults.
 * Per-call options (budget, hop ceiling, strategy allowlist) override these.
 */

import { LinkthruError } from '../types.js';

export interface EngineConfig {
  /** Default total budget for one resolution (ms) */
  requestTimeoutMs: number;
  /** Upper bound for a single HTTP request (ms) */
  fetchTimeoutMs: number;
  /** Transport-level (3xx) redirects followed per fetch */
  maxRedirects: number;
  /** Gate hops followed per resolution */
  maxHops: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  /** Push expiry forward on every cache hit */
  cacheRefreshOnHit: boolean;
  browserPoolSize: number;
  /** Upper bound for one browser navigation (ms) */
  browserTimeoutMs: number;
  browserHeadless: boolean;
  /** Chromium binary for playwright-core; falls back to the installed channel */
  browserExecutablePath?: string;
  cloudflareRetries: number;
  /** Longest countdown the countdown strategy will actually sit out (ms) */
  countdownMaxWaitMs: number;
  /** Allow fetching loopback/private hosts (tests, local mirrors) */
  allowPrivateHosts: boolean;
  redisUrl?: string;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  requestTimeoutMs: 60_000,
  fetchTimeoutMs: 30_000,
  maxRedirects: 10,
  maxHops: 5,
  cacheTtlMs: 24 * 60 * 60 * 1000,
  cacheMaxEntries: 1000,
  cacheRefreshOnHit: false,
  browserPoolSize: 2,
  browserTimeoutMs: 45_000,
  browserHeadless: true,
  cloudflareRetries: 3,
  countdownMaxWaitMs: 10_000,
  allowPrivateHosts: false,
});

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new LinkthruError(`Invalid value for ${name}: "${raw}" (expected an integer >= ${min})`, 'INVALID_CONFIG');
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const lowered = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
  if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
  throw new LinkthruError(`Invalid value for ${name}: "${raw}" (expected true/false)`, 'INVALID_CONFIG');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    requestTimeoutMs: readInt(env, 'LINKTHRU_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs, 1),
    fetchTimeoutMs: readInt(env, 'LINKTHRU_FETCH_TIMEOUT_MS', DEFAULT_CONFIG.fetchTimeoutMs, 1),
    maxRedirects: readInt(env, 'LINKTHRU_MAX_REDIRECTS', DEFAULT_CONFIG.maxRedirects),
    maxHops: readInt(env, 'LINKTHRU_MAX_HOPS', DEFAULT_CONFIG.maxHops, 1),
    cacheTtlMs: readInt(env, 'LINKTHRU_CACHE_TTL_MS', DEFAULT_CONFIG.cacheTtlMs, 1),
    cacheMaxEntries: readInt(env, 'LINKTHRU_CACHE_MAX_ENTRIES', DEFAULT_CONFIG.cacheMaxEntries, 1),
    cacheRefreshOnHit: readBool(env, 'LINKTHRU_CACHE_REFRESH_ON_HIT', DEFAULT_CONFIG.cacheRefreshOnHit),
    browserPoolSize: readInt(env, 'LINKTHRU_BROWSER_POOL_SIZE', DEFAULT_CONFIG.browserPoolSize, 1),
    browserTimeoutMs: readInt(env, 'LINKTHRU_BROWSER_TIMEOUT_MS', DEFAULT_CONFIG.browserTimeoutMs, 1),
    browserHeadless: readBool(env, 'LINKTHRU_HEADLESS', DEFAULT_CONFIG.browserHeadless),
    browserExecutablePath: env.LINKTHRU_BROWSER_EXECUTABLE || undefined,
    cloudflareRetries: readInt(env, 'LINKTHRU_CLOUDFLARE_RETRIES', DEFAULT_CONFIG.cloudflareRetries),
    countdownMaxWaitMs: readInt(env, 'LINKTHRU_COUNTDOWN_MAX_WAIT_MS', DEFAULT_CONFIG.countdownMaxWaitMs),
    allowPrivateHosts: readBool(env, 'LINKTHRU_ALLOW_PRIVATE_HOSTS', DEFAULT_CONFIG.allowPrivateHosts),
    redisUrl: env.REDIS_URL || undefined,
  };
}
