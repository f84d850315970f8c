/**
 * Tests for src/core/challenge-detection.ts
 *
 * Pages mimic what the protection services serve in front of gate sites.
 */

import { describe, it, expect } from 'vitest';
import { detectChallenge } from '../core/challenge-detection.js';

// ── helpers ──────────────────────────────────────────────────────────────────

function page(html: string, status = 200, headers: Record<string, string> = {}) {
  return { html, status, headers };
}

function makeHtml(title: string, body: string): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}

// ── Cloudflare ───────────────────────────────────────────────────────────────

describe('challenge-detection — Cloudflare', () => {
  it('trusts the cf-mitigated header on its own', () => {
    const result = detectChallenge(page('', 403, { 'cf-mitigated': 'challenge' }));
    expect(result).toMatchObject({ isChallenge: true, type: 'cloudflare', confidence: 1 });
  });

  it('detects the "Just a moment" interstitial', () => {
    const html = makeHtml('Just a moment...', `
      <div id="challenge-running"></div>
      <form id="challenge-form" action="/cdn-cgi/challenge-platform/h/b/flow/ov1/0"></form>
      <script>window._cf_chl_opt = { cType: 'managed' };</script>`);
    const result = detectChallenge(page(html, 503, { server: 'cloudflare' }));
    expect(result.isChallenge).toBe(true);
    expect(result.type).toBe('cloudflare');
    expect(result.confidence).toBeGreaterThanOrEqual(0.7);
  });

  it('detects a Turnstile widget page', () => {
    const html = makeHtml('Checking your browser...', `
      <div class="cf-turnstile" data-sitekey="test-key"></div>
      <div class="cf-chl-widget">Please complete the check.</div>`);
    expect(detectChallenge(page(html, 403)).isChallenge).toBe(true);
  });

  it('does not flag a cloudflare-served gate page without challenge markup', () => {
    const html = makeHtml('Your link is almost ready', '<a class="get-link" href="https://real.example/file">Get Link</a>');
    const result = detectChallenge(page(html, 200, { server: 'cloudflare' }));
    expect(result.isChallenge).toBe(false);
  });

  it('suppresses body signals on a long 200 page', () => {
    const article = '<p>' + 'How Cloudflare challenge pages work, explained step by step. '.repeat(40) + '</p>';
    const html = makeHtml('Just a moment: an explainer', `${article}<code>cf-browser-verification cf-challenge</code>`);
    const result = detectChallenge(page(html, 200));
    expect(result.isChallenge).toBe(false);
    expect(result.details).toBe('Suppressed: page has substantial real content');
  });
});

// ── other providers ──────────────────────────────────────────────────────────

describe('challenge-detection — DDoS-Guard and generic blocks', () => {
  it('detects DDoS-Guard', () => {
    const html = makeHtml('DDoS-Guard', '<script src="https://check.ddos-guard.net/check.js"></script>');
    const result = detectChallenge(page(html, 403, { server: 'ddos-guard' }));
    expect(result).toMatchObject({ isChallenge: true, type: 'ddos-guard' });
  });

  it('detects a short 429 block page', () => {
    const html = makeHtml('Access Denied', '<p>Verify you are human.</p>');
    const result = detectChallenge(page(html, 429));
    expect(result).toMatchObject({ isChallenge: true, type: 'generic-block' });
  });

  it('ignores an empty 200 response', () => {
    expect(detectChallenge(page('', 200))).toEqual({ isChallenge: false, confidence: 0 });
  });
});
