/**
 * Fetcher: one HTTP GET/HEAD with manual redirect handling.
 * Connection pooling and SSRF validation live here; caching does not.
 */

import { fetch as undiciFetch, Agent, type Dispatcher } from 'undici';
import { FetchError, InvalidUrlError, LinkthruError, type FetchResult } from '../types.js';
import { browserHeaders, getRealisticUserAgent } from './user-agents.js';
import { debug } from './log.js';

export interface FetchOptions {
  method?: 'GET' | 'HEAD';
  /** Per-call header overrides, merged case-insensitively over the defaults */
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxRedirects?: number;
  signal?: AbortSignal;
}

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxRedirects?: number;
  allowPrivateHosts?: boolean;
  /** undici dispatcher; defaults to a shared keep-alive pool */
  dispatcher?: Dispatcher;
}

const MAX_BODY_BYTES = 10 * 1024 * 1024;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
/** Non-2xx statuses handed to strategies instead of thrown: challenge and rate-limit pages. */
const CHALLENGE_STATUSES = new Set([403, 429, 503]);

// ── HTTP connection pool ──────────────────────────────────────────────────────

function createHttpPool(): Agent {
  return new Agent({
    connections: 20,
    keepAliveTimeout: 30_000,
    keepAliveMaxTimeout: 60_000,
  });
}

let httpPool: Agent | null = null;

function sharedPool(): Agent {
  httpPool ??= createHttpPool();
  return httpPool;
}

export async function closePool(): Promise<void> {
  const oldPool = httpPool;
  httpPool = null;
  if (oldPool) {
    await oldPool.close().catch((e: unknown) => debug('pool close failed:', e));
  }
}

// ── Header helpers ────────────────────────────────────────────────────────────

/** Case-insensitive header lookup on a FetchResult. */
export function getHeader(result: Pick<FetchResult, 'headers'>, name: string): string | undefined {
  return result.headers[name.toLowerCase()];
}

/**
 * Merge header maps; later maps win, names compare case-insensitively and the
 * last spelling is kept. A Host override is refused.
 */
export function mergeHeaders(...sets: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged = new Map<string, [string, string]>();
  for (const set of sets) {
    if (!set) continue;
    for (const [key, value] of Object.entries(set)) {
      if (key.toLowerCase() === 'host') {
        throw new LinkthruError('Custom Host header is not allowed', 'INVALID_HEADER');
      }
      merged.set(key.toLowerCase(), [key, value]);
    }
  }
  return Object.fromEntries([...merged.values()]);
}

/** Cookie header value built from Set-Cookie lines (name=value pairs only). */
export function cookieHeader(setCookies: readonly string[]): string | undefined {
  const pairs = setCookies
    .map((line) => line.split(';')[0]?.trim() ?? '')
    .filter((pair) => pair.includes('='));
  return pairs.length > 0 ? pairs.join('; ') : undefined;
}

// ── SSRF / URL validation ─────────────────────────────────────────────────────

function ipv4Octets(hostname: string): number[] | null {
  const match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (!match) return null;
  const octets = match.slice(1).map(Number);
  return octets.every((o) => o >= 0 && o <= 255) ? octets : null;
}

function isPrivateHost(hostname: string): boolean {
  const host = hostname.replace(/^\[|\]$/g, '').toLowerCase();
  if (host === 'localhost' || host.endsWith('.localhost') || host === '0.0.0.0') return true;

  const octets = ipv4Octets(host);
  if (octets) {
    const [a = 0, b = 0] = octets;
    return a === 127 || a === 10 || a === 0 ||
      (a === 172 && b >= 16 && b <= 31) ||
      (a === 192 && b === 168) ||
      (a === 169 && b === 254);
  }

  if (host.includes(':')) {
    return host === '::1' || host.startsWith('fc') || host.startsWith('fd') ||
      host.startsWith('fe8') || host.startsWith('fe9') || host.startsWith('fea') || host.startsWith('feb') ||
      host.startsWith('::ffff:');
  }
  return false;
}

/**
 * Validate a URL before it is fetched. Every redirect hop goes through this
 * again, so a public gate cannot bounce the fetcher onto an internal address.
 */
export function validateUrl(urlString: string, allowPrivateHosts = false): URL {
  if (urlString.length > 2048) {
    throw new InvalidUrlError('URL too long (max 2048 characters)');
  }
  if (/[\x00-\x1F\x7F]/.test(urlString)) {
    throw new InvalidUrlError('URL contains invalid control characters');
  }

  let url: URL;
  try {
    url = new URL(urlString);
  } catch {
    throw new InvalidUrlError(`Invalid URL format: ${urlString}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidUrlError('Only HTTP and HTTPS protocols are allowed');
  }
  if (!allowPrivateHosts && isPrivateHost(url.hostname)) {
    throw new InvalidUrlError(`Access to ${url.hostname} is not allowed`);
  }
  return url;
}

// ── Fetcher ───────────────────────────────────────────────────────────────────

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function describeCause(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return code ? `${cause.message} (${code})` : cause.message;
  }
  return error.message;
}

async function readBody(body: ReadableStream<Uint8Array> | null): Promise<Buffer> {
  if (!body) return Buffer.alloc(0);

  const chunks: Uint8Array[] = [];
  let totalSize = 0;
  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      totalSize += value.length;
      if (totalSize > MAX_BODY_BYTES) {
        await reader.cancel();
        throw new FetchError('connection-failed', `Response too large (max ${MAX_BODY_BYTES} bytes)`);
      }
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return Buffer.concat(chunks);
}

export class HttpFetcher implements Fetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly allowPrivateHosts: boolean;
  private readonly dispatcher?: Dispatcher;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? getRealisticUserAgent();
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRedirects = options.maxRedirects ?? 10;
    this.allowPrivateHosts = options.allowPrivateHosts ?? false;
    this.dispatcher = options.dispatcher;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startedAt = Date.now();
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const maxRedirects = options.maxRedirects ?? this.maxRedirects;
    let method = options.method ?? 'GET';
    const headers = mergeHeaders(browserHeaders(this.userAgent), options.headers);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const redirects: string[] = [];
    const seen = new Set<string>();
    let currentUrl = url;

    try {
      if (options.signal?.aborted) {
        throw abortError();
      }

      while (true) {
        validateUrl(currentUrl, this.allowPrivateHosts);
        if (seen.has(currentUrl)) {
          throw new FetchError('too-many-redirects', `Redirect loop detected at ${currentUrl}`);
        }
        seen.add(currentUrl);

        const response = await undiciFetch(currentUrl, {
          method,
          headers,
          signal: controller.signal,
          redirect: 'manual',
          dispatcher: this.dispatcher ?? sharedPool(),
        });

        if (REDIRECT_STATUSES.has(response.status)) {
          const location = response.headers.get('location');
          await response.body?.cancel().catch(() => {});
          if (!location) {
            throw new FetchError('connection-failed', `HTTP ${response.status} without a Location header`, response.status);
          }
          if (redirects.length >= maxRedirects) {
            throw new FetchError('too-many-redirects', `Too many redirects (max ${maxRedirects})`);
          }
          redirects.push(currentUrl);
          currentUrl = new URL(location, currentUrl).href;
          if (response.status === 303) method = 'GET';
          debug('redirect', response.status, '→', currentUrl);
          continue;
        }

        if (!response.ok && !CHALLENGE_STATUSES.has(response.status)) {
          await response.body?.cancel().catch(() => {});
          throw new FetchError(
            'http-status',
            `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''} for ${currentUrl}`,
            response.status,
          );
        }

        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          responseHeaders[key.toLowerCase()] = value;
        });
        const body = method === 'HEAD' ? Buffer.alloc(0) : await readBody(response.body);

        return {
          requestedUrl: url,
          url: currentUrl,
          status: response.status,
          headers: responseHeaders,
          cookies: response.headers.getSetCookie(),
          body,
          html: body.toString('utf8'),
          redirects,
          elapsedMs: Date.now() - startedAt,
        };
      }
    } catch (error) {
      if (error instanceof LinkthruError) throw error;
      if (isAbortError(error) || controller.signal.aborted) {
        if (options.signal?.aborted) throw abortError();
        throw new FetchError('timeout', `Request timed out after ${timeoutMs}ms: ${currentUrl}`);
      }
      throw new FetchError('connection-failed', `Failed to fetch ${currentUrl}: ${describeCause(error)}`);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

export function abortError(): Error {
  const error = new Error('Operation aborted');
  error.name = 'AbortError';
  return error;
}
