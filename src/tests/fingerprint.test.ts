import { describe, it, expect } from 'vitest';
import { fingerprint, fingerprintDigest, normalizeUrl, parseSourceUrl } from '../core/fingerprint.js';
import { InvalidUrlError } from '../types.js';

describe('fingerprint — normalization', () => {
  it('lower-cases scheme and host and drops the default port', () => {
    expect(normalizeUrl('HTTPS://Gate.Example:443/AbC')).toBe('https://gate.example/AbC');
  });

  it('keeps the path case-sensitive', () => {
    expect(fingerprint('https://gate.example/AbC')).not.toBe(fingerprint('https://gate.example/abc'));
  });

  it('adds a root path', () => {
    expect(normalizeUrl('https://gate.example')).toBe('https://gate.example/');
  });

  it('strips tracking parameters', () => {
    expect(normalizeUrl('https://gate.example/x?utm_source=tw&id=7&fbclid=abc&UTM_Medium=m'))
      .toBe('https://gate.example/x?id=7');
  });

  it('sorts parameters by key, then value', () => {
    expect(normalizeUrl('https://gate.example/x?b=2&a=9&a=1')).toBe('https://gate.example/x?a=1&a=9&b=2');
  });

  it('keeps the fragment but drops an empty one', () => {
    expect(normalizeUrl('https://gate.example/x#dest')).toBe('https://gate.example/x#dest');
    expect(normalizeUrl('https://gate.example/x#')).toBe('https://gate.example/x');
  });

  it('maps equivalent links to the same fingerprint', () => {
    expect(fingerprint('https://GATE.example/x?b=1&a=2&utm_campaign=z'))
      .toBe(fingerprint('  https://gate.example/x?a=2&b=1 '));
  });

  it('is idempotent', () => {
    const once = fingerprint('https://gate.example/x?z=1&a=%20b&utm_source=q');
    expect(fingerprint(once)).toBe(once);
  });

  it('digests to 64 hex characters', () => {
    expect(fingerprintDigest(fingerprint('https://gate.example/x'))).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('fingerprint — validation', () => {
  it.each([
    ['', 'URL cannot be empty'],
    ['   ', 'URL cannot be empty'],
    ['not a url', 'Invalid URL format: not a url'],
    ['ftp://gate.example/file', 'URL must start with http:// or https://'],
  ])('rejects %j', (input, message) => {
    expect(() => parseSourceUrl(input)).toThrow(InvalidUrlError);
    expect(() => parseSourceUrl(input)).toThrow(message);
  });

  it('rejects URLs over 2048 characters', () => {
    expect(() => parseSourceUrl(`https://gate.example/${'a'.repeat(2050)}`)).toThrow('URL too long');
  });
});
