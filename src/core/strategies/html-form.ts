import type { Strategy } from './types.js';
import { declined, resolved } from './types.js';
import { asHttpUrl, isDestinationCandidate, load, toAbsolute } from './shared.js';

/**
 * Destination carried by a gate's form: a hidden input holding an absolute
 * URL, else an off-gate action turned into the URL a GET submit would load.
 */
export function extractFormTarget(html: string, pageUrl: string): string | null {
  const $ = load(html);

  for (const form of $('form').toArray()) {
    const $form = $(form);

    for (const input of $form.find('input[type="hidden"]').toArray()) {
      const value = asHttpUrl($(input).attr('value')?.trim() ?? '');
      if (isDestinationCandidate(value, pageUrl)) return value;
    }

    const action = toAbsolute($form.attr('action'), pageUrl);
    if (!isDestinationCandidate(action, pageUrl)) continue;

    const target = new URL(action);
    for (const field of $form.find('input[name], select[name], textarea[name]').toArray()) {
      const $field = $(field);
      const type = ($field.attr('type') ?? '').toLowerCase();
      if (type === 'submit' || type === 'button' || type === 'image' || type === 'file') continue;
      if ((type === 'checkbox' || type === 'radio') && $field.attr('checked') === undefined) continue;
      const name = $field.attr('name') ?? '';
      const value = field.tagName === 'textarea' ? $field.text() : $field.attr('value') ?? '';
      target.searchParams.append(name, value);
    }
    return target.href;
  }
  return null;
}

export const htmlFormStrategy: Strategy = {
  id: 'html-form',
  name: 'HTML Form Bypass',
  requiresPage: true,
  minCostMs: 0,

  async attempt(ctx) {
    const page = ctx.page;
    if (!page) return declined('page unavailable');
    if (!/<form[\s>]/i.test(page.html)) return declined('no form on page');

    const target = extractFormTarget(page.html, page.url);
    return target ? resolved(target) : declined('form has no off-gate target');
  },
};
