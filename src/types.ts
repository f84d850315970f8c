/**
 * Core types for linkthru
 */

/** Stable identifiers of the ten bypass strategies, in priority order. */
export const STRATEGY_IDS = [
  'html-form',
  'css-hidden',
  'javascript',
  'countdown',
  'dynamic-content',
  'cloudflare',
  'redirect-chain',
  'base64-decode',
  'url-decode',
  'browser-automation',
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export function isStrategyId(value: string): value is StrategyId {
  return STRATEGY_IDS.some((id) => id === value);
}

export type StrategyName =
  | 'HTML Form Bypass'
  | 'CSS Hidden-Element'
  | 'JavaScript Execution'
  | 'Countdown Timer Bypass'
  | 'Dynamic Content'
  | 'Cloudflare Bypass'
  | 'Redirect Chain'
  | 'Base64 Decode'
  | 'URL Decode'
  | 'Browser Automation';

export interface ResolutionRequest {
  /** Source URL as given by the caller (trimmed) */
  readonly url: string;
  /** Total time budget for the whole resolution (ms) */
  readonly budgetMs: number;
  /** Maximum number of next-hop URLs followed before giving up */
  readonly maxHops: number;
  /** Strategies allowed for this link's domain */
  readonly strategies: ReadonlySet<StrategyId>;
}

export interface FetchResult {
  /** URL the fetch started from */
  requestedUrl: string;
  /** Final URL after transport-level (3xx) redirects */
  url: string;
  status: number;
  /** Response headers with lower-cased names. Read through getHeader(). */
  headers: Record<string, string>;
  /** Raw Set-Cookie values, in response order */
  cookies: string[];
  body: Buffer;
  /** Body decoded as UTF-8 text */
  html: string;
  /** Every URL visited through 3xx responses, excluding the final one */
  redirects: string[];
  elapsedMs: number;
}

export type FetchErrorKind = 'timeout' | 'too-many-redirects' | 'connection-failed' | 'http-status';

export type StrategyErrorKind = 'parse-failed' | 'challenge-unsolved' | 'budget-exceeded' | 'browser-crashed';

export type StrategyOutcome =
  | { kind: 'resolved'; nextUrl: string; hops?: number }
  | { kind: 'declined'; reason: string }
  | { kind: 'failed'; errorKind: FetchErrorKind | StrategyErrorKind; detail: string };

export interface StrategyAttempt {
  strategy: StrategyName;
  /** URL the strategy ran against (changes when the pipeline follows a gate hop) */
  url: string;
  outcome: StrategyOutcome['kind'];
  /** Decline reason or failure detail */
  detail?: string;
  elapsedMs: number;
}

export type PipelineErrorKind = 'all-strategies-declined' | 'budget-exhausted' | 'hop-limit-exceeded';

export interface ResolutionResult {
  source: string;
  fingerprint: string;
  /** Final destination, or null when nothing resolved */
  destination: string | null;
  strategy: StrategyName | null;
  hops: number;
  elapsedMs: number;
  provenance: 'cache' | 'fresh';
  /** True when this caller waited on another caller's in-flight resolution */
  shared: boolean;
  attempts: StrategyAttempt[];
  error?: {
    kind: PipelineErrorKind;
    message: string;
  };
}

export interface CacheEntry {
  fingerprint: string;
  source: string;
  destination: string;
  strategy: StrategyName | null;
  /** Epoch ms */
  resolvedAt: number;
  /** Epoch ms */
  expiresAt: number;
  hits: number;
}

export class LinkthruError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'LinkthruError';
  }
}

export class InvalidUrlError extends LinkthruError {
  constructor(message: string) {
    super(message, 'INVALID_URL');
    this.name = 'InvalidUrlError';
  }
}

export class FetchError extends LinkthruError {
  constructor(public kind: FetchErrorKind, message: string, public status?: number) {
    super(message, `FETCH_${kind.toUpperCase().replace(/-/g, '_')}`);
    this.name = 'FetchError';
  }
}

export class StrategyError extends LinkthruError {
  constructor(public kind: StrategyErrorKind, message: string) {
    super(message, `STRATEGY_${kind.toUpperCase().replace(/-/g, '_')}`);
    this.name = 'StrategyError';
  }
}

export class PipelineError extends LinkthruError {
  constructor(public kind: PipelineErrorKind, message: string, public attempts: StrategyAttempt[] = []) {
    super(message, `PIPELINE_${kind.toUpperCase().replace(/-/g, '_')}`);
    this.name = 'PipelineError';
  }
}

export class CacheError extends LinkthruError {
  constructor(message: string, public kind: 'backend-unavailable' = 'backend-unavailable') {
    super(message, 'CACHE_BACKEND_UNAVAILABLE');
    this.name = 'CacheError';
  }
}
