import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../core/config.js';
import { LinkthruError } from '../types.js';

describe('config — loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ ...DEFAULT_CONFIG, browserExecutablePath: undefined, redisUrl: undefined });
  });

  it('keeps the documented defaults', () => {
    expect(DEFAULT_CONFIG.requestTimeoutMs).toBe(60_000);
    expect(DEFAULT_CONFIG.browserTimeoutMs).toBe(45_000);
    expect(DEFAULT_CONFIG.cacheTtlMs).toBe(24 * 60 * 60 * 1000);
  });

  it('reads numbers and booleans from LINKTHRU_* variables', () => {
    const config = loadConfig({
      LINKTHRU_TIMEOUT_MS: '15000',
      LINKTHRU_MAX_HOPS: '3',
      LINKTHRU_HEADLESS: 'off',
      LINKTHRU_CACHE_REFRESH_ON_HIT: 'yes',
      LINKTHRU_BROWSER_EXECUTABLE: '/usr/bin/chromium',
      REDIS_URL: 'redis://localhost:6379',
    });
    expect(config.requestTimeoutMs).toBe(15_000);
    expect(config.maxHops).toBe(3);
    expect(config.browserHeadless).toBe(false);
    expect(config.cacheRefreshOnHit).toBe(true);
    expect(config.browserExecutablePath).toBe('/usr/bin/chromium');
    expect(config.redisUrl).toBe('redis://localhost:6379');
  });

  it('ignores blank values', () => {
    expect(loadConfig({ LINKTHRU_TIMEOUT_MS: '  ' }).requestTimeoutMs).toBe(60_000);
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ LINKTHRU_TIMEOUT_MS: 'soon' })).toThrow(LinkthruError);
    expect(() => loadConfig({ LINKTHRU_MAX_HOPS: '0' })).toThrow('LINKTHRU_MAX_HOPS');
  });

  it('rejects malformed booleans', () => {
    expect(() => loadConfig({ LINKTHRU_HEADLESS: 'maybe' })).toThrow('expected true/false');
  });
});
