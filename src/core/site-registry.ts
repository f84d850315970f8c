/**
 * Supported gate sites.
 *
 * Tells the pipeline which hosts are gates (so a resolved URL on one of them is
 * followed as another hop rather than returned) and which strategies are worth
 * running per domain. Domains match themselves and their subdomains.
 */

import { readFileSync } from 'node:fs';
import { STRATEGY_IDS, isStrategyId, LinkthruError, type StrategyId } from '../types.js';

export interface SiteEntry {
  domain: string;
  /** Strategy allowlist; undefined means all strategies */
  strategies?: ReadonlySet<StrategyId>;
}

interface SiteFile {
  sites: Array<{ domain: string; strategies?: string[] }>;
}

const DEFAULT_SITES_FILE = new URL('../data/gate-sites.json', import.meta.url);

function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^www\./, '').replace(/\.$/, '');
}

export function parseStrategyList(ids: readonly string[], source = 'strategy list'): Set<StrategyId> {
  const parsed = new Set<StrategyId>();
  for (const id of ids) {
    const trimmed = id.trim();
    if (!isStrategyId(trimmed)) {
      throw new LinkthruError(
        `Unknown strategy "${trimmed}" in ${source} (expected one of: ${STRATEGY_IDS.join(', ')})`,
        'INVALID_STRATEGY',
      );
    }
    parsed.add(trimmed);
  }
  return parsed;
}

export class SiteRegistry {
  private readonly sites = new Map<string, SiteEntry>();

  constructor(entries: Iterable<SiteEntry> = []) {
    for (const entry of entries) {
      this.register(entry.domain, entry.strategies);
    }
  }

  /** Registry loaded from the bundled gate-sites.json. */
  static loadDefault(): SiteRegistry {
    return SiteRegistry.fromJson(readFileSync(DEFAULT_SITES_FILE, 'utf8'));
  }

  static fromJson(json: string): SiteRegistry {
    const data: unknown = JSON.parse(json);
    if (!isSiteFile(data)) {
      throw new LinkthruError('Site registry JSON must look like { "sites": [{ "domain": "..." }] }', 'INVALID_CONFIG');
    }
    return new SiteRegistry(
      data.sites.map((site) => ({
        domain: site.domain,
        strategies: site.strategies ? parseStrategyList(site.strategies, site.domain) : undefined,
      })),
    );
  }

  register(domain: string, strategies?: Iterable<StrategyId>): void {
    const key = normalizeDomain(domain);
    if (!key) {
      throw new LinkthruError('Domain cannot be empty', 'INVALID_CONFIG');
    }
    this.sites.set(key, { domain: key, strategies: strategies ? new Set(strategies) : undefined });
  }

  unregister(domain: string): boolean {
    return this.sites.delete(normalizeDomain(domain));
  }

  /** Entry for the URL's host (most specific registered suffix wins). */
  lookup(urlOrHost: string): SiteEntry | undefined {
    let host: string;
    try {
      host = urlOrHost.includes('://') ? new URL(urlOrHost).hostname : urlOrHost;
    } catch {
      return undefined;
    }
    const labels = normalizeDomain(host).split('.');
    for (let i = 0; i < labels.length - 1; i++) {
      const entry = this.sites.get(labels.slice(i).join('.'));
      if (entry) return entry;
    }
    return undefined;
  }

  isGateHost(host: string): boolean {
    return this.lookup(host) !== undefined;
  }

  strategiesFor(url: string): ReadonlySet<StrategyId> | undefined {
    return this.lookup(url)?.strategies;
  }

  list(): SiteEntry[] {
    return [...this.sites.values()].sort((a, b) => a.domain.localeCompare(b.domain));
  }

  get size(): number {
    return this.sites.size;
  }
}

function isSiteFile(value: unknown): value is SiteFile {
  if (typeof value !== 'object' || value === null || !('sites' in value)) return false;
  const { sites } = value;
  return Array.isArray(sites) && sites.every((site: unknown) =>
    typeof site === 'object' && site !== null &&
    'domain' in site && typeof site.domain === 'string' &&
    (!('strategies' in site) || site.strategies === undefined ||
      (Array.isArray(site.strategies) && site.strategies.every((s: unknown) => typeof s === 'string'))),
  );
}
