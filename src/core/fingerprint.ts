/**
 * Link fingerprinting: the canonical form of a source URL used as the cache key.
 *
 * Normalization:
 *   - scheme and host lower-cased, default port dropped
 *   - path kept verbatim (shortlink codes are case-sensitive), empty path → "/"
 *   - tracking parameters stripped, the rest sorted by key then value
 *   - fragment kept: several gates carry the destination in it
 */

import { createHash } from 'node:crypto';
import { InvalidUrlError } from '../types.js';

const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'dclid',
  'msclkid',
  'mc_cid',
  'mc_eid',
  'igshid',
  '_ga',
]);

function isTrackingParam(key: string): boolean {
  const lowered = key.toLowerCase();
  return lowered.startsWith('utm_') || TRACKING_PARAMS.has(lowered);
}

/** Parse a caller-supplied URL, accepting only absolute http(s) URLs. */
export function parseSourceUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidUrlError('URL cannot be empty');
  }
  if (trimmed.length > 2048) {
    throw new InvalidUrlError('URL too long (max 2048 characters)');
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new InvalidUrlError(`Invalid URL format: ${trimmed}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidUrlError('URL must start with http:// or https://');
  }
  if (!url.hostname) {
    throw new InvalidUrlError('URL must have a valid domain');
  }
  return url;
}

export function normalizeUrl(raw: string): string {
  const url = parseSourceUrl(raw);

  // WHATWG URL already lower-cases scheme and host and drops default ports.
  if (!url.pathname) {
    url.pathname = '/';
  }

  const params = [...url.searchParams.entries()]
    .filter(([key]) => !isTrackingParam(key))
    .sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));
  url.search = '';
  for (const [key, value] of params) {
    url.searchParams.append(key, value);
  }

  // An empty fragment ("…#") reads back as '' but still serializes the '#'.
  if (!url.hash) {
    url.hash = '';
  }

  return url.toString();
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Fingerprint of a source URL. Idempotent: fingerprint(fingerprint(u)) === fingerprint(u). */
export function fingerprint(raw: string): string {
  return normalizeUrl(raw);
}

/** Fixed-length digest of a fingerprint, for stores with key-length limits. */
export function fingerprintDigest(fp: string): string {
  return createHash('sha256').update(fp).digest('hex');
}
