/**
 * Challenge / bot-protection page detection.
 *
 * Decides whether a fetched gate page is an interstitial challenge rather than
 * the gate itself. Header markers are checked first (they are cheap and
 * unambiguous), then the body is scored. Pure string/regex matching; flags a
 * challenge only at confidence >= 0.7.
 */

import type { FetchResult } from '../types.js';
import { getHeader } from './http-fetch.js';

export type ChallengeType = 'cloudflare' | 'ddos-guard' | 'generic-block';

export interface ChallengeDetectionResult {
  isChallenge: boolean;
  type?: ChallengeType;
  /** Confidence score from 0 (not a challenge) to 1 (definitely a challenge). */
  confidence: number;
  details?: string;
}

const THRESHOLD = 0.7;

/* ---------- helpers ------------------------------------------------------ */

function countMatches(html: string, needles: readonly string[]): number {
  let count = 0;
  for (const needle of needles) {
    if (html.includes(needle)) count++;
  }
  return count;
}

/** Lower-cased <title> content. */
function extractTitle(html: string): string {
  const m = html.match(/<title[^>]*>([^<]*)<\/title>/i);
  return m?.[1] ? m[1].toLowerCase().trim() : '';
}

function estimateVisibleTextLength(html: string): number {
  return html
    .replace(/<script[\s\S]*?<\/script>/gi, '')
    .replace(/<style[\s\S]*?<\/style>/gi, '')
    .replace(/<[^>]*>/g, '')
    .replace(/\s+/g, ' ')
    .trim().length;
}

/* ---------- header markers ----------------------------------------------- */

function scoreCloudflareHeaders(page: Pick<FetchResult, 'headers' | 'status'>): number {
  // Cloudflare sets this only on challenge responses.
  if (getHeader(page, 'cf-mitigated')?.toLowerCase() === 'challenge') return 1;

  let score = 0;
  if (Object.keys(page.headers).some((name) => name.startsWith('cf-chl-'))) {
    score += 0.5;
  }
  const server = getHeader(page, 'server')?.toLowerCase() ?? '';
  if (server.includes('cloudflare') && (page.status === 403 || page.status === 503)) {
    score += 0.3;
  }
  return score;
}

/* ---------- body detectors ----------------------------------------------- */

function scoreCloudflareBody(html: string): number {
  let score = 0;

  const strongSignals = [
    'cf-browser-verification',
    'cf-turnstile',
    'cf-challenge',
    'cf-chl-widget',
    'challenge-running',
    'challenge-form',
    'window._cf_chl_opt',
    '__cf_chl_f_tk',
    'cf_chl_prog',
    'cdn-cgi/challenge-platform',
  ];
  score += Math.min(countMatches(html, strongSignals) * 0.25, 0.75);

  const title = extractTitle(html);
  if (
    title.includes('just a moment') ||
    title.includes('attention required') ||
    title.includes('checking your browser') ||
    title.includes('one more step')
  ) {
    score += 0.35;
  }

  if (/ray id:?/i.test(html)) {
    score += 0.2;
  }

  return Math.min(score, 1);
}

function scoreDdosGuard(html: string, page: Pick<FetchResult, 'headers'>): number {
  let score = 0;
  if ((getHeader(page, 'server') ?? '').toLowerCase().includes('ddos-guard')) score += 0.4;
  score += Math.min(countMatches(html, ['ddos-guard', '__ddg1', '__ddg2', 'check.ddos-guard.net']) * 0.3, 0.6);
  return Math.min(score, 1);
}

function scoreGenericBlock(htmlLower: string, status: number): number {
  let score = 0;

  const title = extractTitle(htmlLower);
  const blockTitles = [
    'access denied',
    'security check',
    'ddos protection',
    'browser check',
    'human verification',
    'verify you are human',
  ];
  if (blockTitles.some((t) => title.includes(t))) {
    score += 0.35;
  }

  const bodySignals = [
    'verify you are human',
    'checking your browser before accessing',
    'enable javascript and cookies to continue',
    'please complete the security check',
    'why have i been blocked',
    'ddos protection by',
  ];
  const bodyCount = countMatches(htmlLower, bodySignals);
  if (bodyCount >= 2) {
    score += Math.min((bodyCount - 1) * 0.2, 0.4);
  }

  if (htmlLower.length < 1000 && (status === 403 || status === 503 || status === 429)) {
    score += 0.25;
  }
  if (status === 429) {
    score += 0.25;
  }

  return Math.min(score, 1);
}

/* ---------- main export -------------------------------------------------- */

/**
 * Detect whether a fetched page is a bot challenge.
 *
 * A 200 page with plenty of visible text is never flagged on body signals
 * alone; a post that quotes challenge markup is not a challenge.
 */
export function detectChallenge(page: Pick<FetchResult, 'html' | 'headers' | 'status'>): ChallengeDetectionResult {
  const headerScore = scoreCloudflareHeaders(page);
  if (headerScore >= THRESHOLD) {
    return {
      isChallenge: true,
      type: 'cloudflare',
      confidence: headerScore,
      details: 'Cloudflare challenge headers',
    };
  }

  const html = page.html;
  if (!html && headerScore === 0) {
    return { isChallenge: false, confidence: 0 };
  }

  const scores: Array<{ type: ChallengeType; score: number }> = [
    { type: 'cloudflare', score: Math.min(scoreCloudflareBody(html) + headerScore, 1) },
    { type: 'ddos-guard', score: scoreDdosGuard(html.toLowerCase(), page) },
    { type: 'generic-block', score: scoreGenericBlock(html.toLowerCase(), page.status) },
  ];

  let best = scores[0] ?? { type: 'cloudflare' as const, score: 0 };
  for (const entry of scores) {
    if (entry.score > best.score) best = entry;
  }

  if (page.status === 200 && estimateVisibleTextLength(html) > 1500) {
    return {
      isChallenge: false,
      confidence: best.score * 0.4,
      details: 'Suppressed: page has substantial real content',
    };
  }

  if (best.score < THRESHOLD) {
    return { isChallenge: false, confidence: best.score };
  }

  return {
    isChallenge: true,
    type: best.type,
    confidence: best.score,
    details: `Detected as ${best.type} (confidence ${best.score.toFixed(2)})`,
  };
}
