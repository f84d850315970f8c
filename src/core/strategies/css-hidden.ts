/**
 * Gate pages often plant decoy links and hide the real one (or the reverse).
 * Only pages that actually hide something are considered; the pick is the
 * best-scoring visible off-gate anchor.
 */

import type { Element } from 'domhandler';
import type { Strategy } from './types.js';
import { declined, resolved } from './types.js';
import { LINK_MARKER, isDestinationCandidate, load, toAbsolute, type CheerioRoot } from './shared.js';

const HIDING_DECLARATION = /display\s*:\s*none|visibility\s*:\s*hidden|opacity\s*:\s*0(?![.\d]*[1-9])/i;

/** `.class` and `#id` selectors hidden by rules in <style> blocks. */
function hiddenSelectors($: CheerioRoot): { classes: Set<string>; ids: Set<string> } {
  const classes = new Set<string>();
  const ids = new Set<string>();
  const css = $('style').toArray().map((el) => $(el).text()).join('\n');

  for (const rule of css.matchAll(/([^{}]+)\{([^}]*)\}/g)) {
    const [, selectorList = '', body = ''] = rule;
    if (!HIDING_DECLARATION.test(body)) continue;
    for (const selector of selectorList.split(',')) {
      const simple = selector.trim().match(/^([.#])([\w-]+)$/);
      if (!simple) continue;
      const [, kind, name = ''] = simple;
      (kind === '.' ? classes : ids).add(name);
    }
  }
  return { classes, ids };
}

function isHiddenElement($: CheerioRoot, el: Element, rules: ReturnType<typeof hiddenSelectors>): boolean {
  const $el = $(el);
  if ($el.attr('hidden') !== undefined) return true;
  if (HIDING_DECLARATION.test($el.attr('style') ?? '')) return true;
  const id = $el.attr('id');
  if (id && rules.ids.has(id)) return true;
  const classList = ($el.attr('class') ?? '').split(/\s+/).filter(Boolean);
  return classList.some((cls) => rules.classes.has(cls));
}

function isHidden($: CheerioRoot, el: Element, rules: ReturnType<typeof hiddenSelectors>): boolean {
  if (isHiddenElement($, el, rules)) return true;
  return $(el).parents().toArray().some((parent) => isHiddenElement($, parent, rules));
}

function markerScore($: CheerioRoot, el: Element): number {
  const $el = $(el);
  const label = [$el.attr('class'), $el.attr('id'), $el.text()].filter(Boolean).join(' ');
  return LINK_MARKER.test(label) ? 2 : 0;
}

/**
 * Best visible off-gate anchor: link markers in class/id/text score 2, being
 * off-gate scores 1; ties go to the first in document order.
 */
export function pickBestAnchor($: CheerioRoot, pageUrl: string, skip: (el: Element) => boolean = () => false): string | null {
  let best: { href: string; score: number } | null = null;
  for (const el of $('a[href]').toArray()) {
    if (skip(el)) continue;
    const href = toAbsolute($(el).attr('href'), pageUrl);
    if (!isDestinationCandidate(href, pageUrl)) continue;
    const score = 1 + markerScore($, el);
    if (!best || score > best.score) best = { href, score };
  }
  return best?.href ?? null;
}

export function countHiddenAnchors(html: string): number {
  const $ = load(html);
  const rules = hiddenSelectors($);
  return $('a').toArray().filter((el) => isHidden($, el, rules)).length;
}

export function extractVisibleLink(html: string, pageUrl: string): string | null {
  const $ = load(html);
  const rules = hiddenSelectors($);
  const hidden = $('a').toArray().filter((el) => isHidden($, el, rules));
  if (hidden.length === 0) return null;
  return pickBestAnchor($, pageUrl, (el) => hidden.includes(el));
}

export const cssHiddenStrategy: Strategy = {
  id: 'css-hidden',
  name: 'CSS Hidden-Element',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');
    if (countHiddenAnchors(page.html) === 0) return declined('no hidden links on page');

    const link = extractVisibleLink(page.html, page.url);
    return link ? resolved(link) : declined('no visible off-gate link');
  },
};
