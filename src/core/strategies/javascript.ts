import type { Strategy } from './types.js';
import { declined, resolved } from './types.js';
import { inlineScripts, isDestinationCandidate, load, toAbsolute, unescapeJs } from './shared.js';

const NAVIGATION_PATTERNS: readonly RegExp[] = [
  /(?:window\.|document\.|top\.|self\.|parent\.)?location(?:\.href)?\s*=\s*(['"`])(.+?)\1/g,
  /location\.(?:replace|assign)\(\s*(['"`])(.+?)\1/g,
  /window\.open\(\s*(['"`])(.+?)\1/g,
  /(?:var|let|const)\s+\w*(?:url|link|dest|target|redirect|href)\w*\s*=\s*(['"`])(.+?)\1/gi,
];

/** String literals a script navigates to (or stores as its target), in source order. */
export function scriptNavigationTargets(script: string): string[] {
  const found: Array<{ index: number; value: string }> = [];
  for (const pattern of NAVIGATION_PATTERNS) {
    for (const match of script.matchAll(pattern)) {
      const value = match[2];
      if (value) found.push({ index: match.index ?? 0, value: unescapeJs(value) });
    }
  }
  return found.sort((a, b) => a.index - b.index).map((f) => f.value);
}

export function extractScriptTarget(html: string, pageUrl: string): string | null {
  for (const script of inlineScripts(load(html))) {
    for (const target of scriptNavigationTargets(script)) {
      const absolute = toAbsolute(target, pageUrl);
      if (isDestinationCandidate(absolute, pageUrl)) return absolute;
    }
  }
  return null;
}

export const javascriptStrategy: Strategy = {
  id: 'javascript',
  name: 'JavaScript Execution',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');
    if (!/<script(?![^>]*\bsrc=)[^>]*>/i.test(page.html)) return declined('no inline scripts');

    const target = extractScriptTarget(page.html, page.url);
    return target ? resolved(target) : declined('no script navigation target');
  },
};
