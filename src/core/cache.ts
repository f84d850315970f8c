/**
 * Link cache keyed by source-URL fingerprint.
 *
 * - Backing store: in-process LRU by default, Redis when REDIS_URL is set
 * - Entries expire after their TTL; expired entries are dropped on read
 * - In-flight resolutions are coalesced per fingerprint
 *
 * The store is an optimisation. A backend that cannot be reached degrades to
 * misses (reads) or is skipped (writes); resolution itself never fails on it.
 */

import { LRUCache } from 'lru-cache';
import { Redis } from 'ioredis';
import { CacheError, type CacheEntry, type ResolutionResult, type StrategyName } from '../types.js';
import { fingerprintDigest } from './fingerprint.js';
import { debug, errorMessage, warn } from './log.js';

export interface CacheStore {
  get(fingerprint: string): Promise<CacheEntry | undefined>;
  set(entry: CacheEntry): Promise<void>;
  delete(fingerprint: string): Promise<void>;
  close?(): Promise<void>;
}

// ── In-process store ──────────────────────────────────────────────────────────

export class MemoryCacheStore implements CacheStore {
  private readonly entries: LRUCache<string, CacheEntry>;

  constructor(maxEntries = 1000) {
    this.entries = new LRUCache<string, CacheEntry>({ max: maxEntries });
  }

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    return this.entries.get(fingerprint);
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.fingerprint, entry);
  }

  async delete(fingerprint: string): Promise<void> {
    this.entries.delete(fingerprint);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ── Redis store ───────────────────────────────────────────────────────────────

/** The slice of the ioredis client the store uses. */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

const KEY_PREFIX = 'linkthru:link:';

export function redisKey(fingerprint: string): string {
  return KEY_PREFIX + fingerprintDigest(fingerprint);
}

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    connectTimeout: 1000,
  });
  client.on('error', (err: unknown) => debug('redis error:', errorMessage(err)));
  return client;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return typeof value === 'object' && value !== null &&
    'fingerprint' in value && typeof value.fingerprint === 'string' &&
    'destination' in value && typeof value.destination === 'string' &&
    'expiresAt' in value && typeof value.expiresAt === 'number';
}

export class RedisCacheStore implements CacheStore {
  constructor(private readonly client: RedisClientLike) {}

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    let payload: string | null;
    try {
      payload = await this.client.get(redisKey(fingerprint));
    } catch (e) {
      throw new CacheError(`Redis read failed: ${errorMessage(e)}`);
    }
    if (payload === null) return undefined;
    const parsed: unknown = JSON.parse(payload);
    return isCacheEntry(parsed) ? parsed : undefined;
  }

  async set(entry: CacheEntry): Promise<void> {
    const ttlMs = Math.max(1, entry.expiresAt - Date.now());
    try {
      await this.client.set(redisKey(entry.fingerprint), JSON.stringify(entry), 'PX', ttlMs);
    } catch (e) {
      throw new CacheError(`Redis write failed: ${errorMessage(e)}`);
    }
  }

  async delete(fingerprint: string): Promise<void> {
    try {
      await this.client.del(redisKey(fingerprint));
    } catch (e) {
      throw new CacheError(`Redis delete failed: ${errorMessage(e)}`);
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

// ── Link cache ────────────────────────────────────────────────────────────────

export interface LinkCacheOptions {
  store?: CacheStore;
  ttlMs?: number;
  /** Push expiry forward on every hit */
  refreshOnHit?: boolean;
  /** Clock, for tests */
  now?: () => number;
}

export interface PutOptions {
  source: string;
  strategy: StrategyName | null;
  ttlMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
  inFlight: number;
}

export class LinkCache {
  private readonly store: CacheStore;
  private readonly ttlMs: number;
  private readonly refreshOnHit: boolean;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<ResolutionResult>>();
  private counters = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(options: LinkCacheOptions = {}) {
    this.store = options.store ?? new MemoryCacheStore();
    this.ttlMs = options.ttlMs ?? 24 * 60 * 60 * 1000;
    this.refreshOnHit = options.refreshOnHit ?? false;
    this.now = options.now ?? Date.now;
  }

  /**
   * Live entry for a fingerprint. Expired entries are deleted and reported as
   * misses; an unreachable backend is a miss too.
   */
  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(fingerprint);
    } catch (e) {
      this.counters.errors++;
      warn('cache read failed, treating as miss:', errorMessage(e));
      return undefined;
    }

    if (!entry) {
      this.counters.misses++;
      return undefined;
    }

    const now = this.now();
    if (entry.expiresAt <= now) {
      this.counters.misses++;
      await this.store.delete(fingerprint).catch((e: unknown) => {
        this.counters.errors++;
        debug('expired entry delete failed:', errorMessage(e));
      });
      return undefined;
    }

    const updated: CacheEntry = {
      ...entry,
      hits: entry.hits + 1,
      expiresAt: this.refreshOnHit ? now + this.ttlMs : entry.expiresAt,
    };
    this.counters.hits++;
    await this.write(updated);
    return updated;
  }

  async put(fingerprint: string, destination: string, options: PutOptions): Promise<CacheEntry> {
    const now = this.now();
    const entry: CacheEntry = {
      fingerprint,
      source: options.source,
      destination,
      strategy: options.strategy,
      resolvedAt: now,
      expiresAt: now + (options.ttlMs ?? this.ttlMs),
      hits: 0,
    };
    if (await this.write(entry)) this.counters.writes++;
    return entry;
  }

  async invalidate(fingerprint: string): Promise<void> {
    try {
      await this.store.delete(fingerprint);
    } catch (e) {
      this.counters.errors++;
      warn('cache invalidate failed:', errorMessage(e));
    }
  }

  /**
   * Run `task` at most once per fingerprint at a time. Concurrent callers for
   * the same fingerprint get the first caller's promise; `shared` tells them
   * apart. The slot is released when the task settles, whatever the outcome.
   *
   * `wait` wraps the shared promise for a joining caller, so that caller can
   * stop waiting on its own terms while the task runs on for the others.
   */
  async coalesce(
    fingerprint: string,
    task: () => Promise<ResolutionResult>,
    wait: (pending: Promise<ResolutionResult>) => Promise<ResolutionResult> = (pending) => pending,
  ): Promise<{ value: ResolutionResult; shared: boolean }> {
    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      debug('coalescing on in-flight resolution:', fingerprint);
      return { value: await wait(pending), shared: true };
    }

    const promise = task();
    this.inFlight.set(fingerprint, promise);
    try {
      return { value: await promise, shared: false };
    } finally {
      this.inFlight.delete(fingerprint);
    }
  }

  stats(): CacheStats {
    return { ...this.counters, inFlight: this.inFlight.size };
  }

  async close(): Promise<void> {
    this.inFlight.clear();
    await this.store.close?.();
  }

  private async write(entry: CacheEntry): Promise<boolean> {
    try {
      await this.store.set(entry);
      return true;
    } catch (e) {
      this.counters.errors++;
      warn('cache write failed, continuing without cache:', errorMessage(e));
      return false;
    }
  }
}

export function createLinkCache(options: {
  redisUrl?: string;
  maxEntries?: number;
  ttlMs?: number;
  refreshOnHit?: boolean;
}): LinkCache {
  const store = options.redisUrl
    ? new RedisCacheStore(createRedisClient(options.redisUrl))
    : new MemoryCacheStore(options.maxEntries);
  return new LinkCache({ store, ttlMs: options.ttlMs, refreshOnHit: options.refreshOnHit });
}
