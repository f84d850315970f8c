import { describe, it, expect } from 'vitest';
import { SiteRegistry, parseStrategyList } from '../core/site-registry.js';
import { LinkthruError } from '../types.js';

describe('site-registry — bundled list', () => {
  const sites = SiteRegistry.loadDefault();

  it('loads the bundled gate domains', () => {
    expect(sites.size).toBeGreaterThan(20);
    expect(sites.isGateHost('gplinks.co')).toBe(true);
  });

  it('matches subdomains and a leading www', () => {
    expect(sites.lookup('https://www.ouo.io/abc')?.domain).toBe('ouo.io');
    expect(sites.lookup('https://cdn.mediafire.com/file')?.domain).toBe('mediafire.com');
  });

  it('does not match lookalike domains', () => {
    expect(sites.lookup('https://notouo.io/abc')).toBeUndefined();
    expect(sites.lookup('https://ouo.io.evil.example/abc')).toBeUndefined();
  });

  it('carries per-domain strategy allowlists', () => {
    expect([...(sites.strategiesFor('https://bit.ly/x') ?? [])]).toEqual(['redirect-chain']);
    expect(sites.strategiesFor('https://gplinks.co/x')).toBeUndefined();
  });
});

describe('site-registry — registration', () => {
  it('registers and unregisters domains', () => {
    const sites = new SiteRegistry();
    sites.register('Gate.Example.', ['base64-decode']);
    expect(sites.lookup('http://sub.gate.example/x')?.strategies).toEqual(new Set(['base64-decode']));
    expect(sites.unregister('gate.example')).toBe(true);
    expect(sites.isGateHost('gate.example')).toBe(false);
  });

  it('lists domains alphabetically', () => {
    const sites = new SiteRegistry([{ domain: 'b.example' }, { domain: 'a.example' }]);
    expect(sites.list().map((s) => s.domain)).toEqual(['a.example', 'b.example']);
  });

  it('returns undefined for unparseable input', () => {
    expect(new SiteRegistry().lookup('http://')).toBeUndefined();
  });

  it('rejects malformed JSON files', () => {
    expect(() => SiteRegistry.fromJson('{"domains": []}')).toThrow(LinkthruError);
    expect(() => SiteRegistry.fromJson('{"sites": [{"domain": "a.example", "strategies": ["teleport"]}]}'))
      .toThrow('Unknown strategy "teleport" in a.example');
  });
});

describe('site-registry — parseStrategyList', () => {
  it('parses and trims ids', () => {
    expect(parseStrategyList([' url-decode', 'base64-decode '])).toEqual(new Set(['url-decode', 'base64-decode']));
  });

  it('rejects unknown ids', () => {
    expect(() => parseStrategyList(['magic'], '--strategies')).toThrow('Unknown strategy "magic" in --strategies');
  });
});
