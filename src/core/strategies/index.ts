/**
 * Strategy registry. Order is priority: cheap static reads of the page first,
 * network-bound strategies next, the browser last.
 */

import type { StrategyId } from '../../types.js';
import type { Strategy } from './types.js';
import { htmlFormStrategy } from './html-form.js';
import { cssHiddenStrategy } from './css-hidden.js';
import { javascriptStrategy } from './javascript.js';
import { countdownStrategy } from './countdown.js';
import { dynamicContentStrategy } from './dynamic-content.js';
import { cloudflareStrategy } from './cloudflare.js';
import { redirectChainStrategy } from './redirect-chain.js';
import { base64DecodeStrategy } from './base64-decode.js';
import { urlDecodeStrategy } from './url-decode.js';
import { browserAutomationStrategy } from './browser-automation.js';

export const STRATEGIES: readonly Strategy[] = [
  htmlFormStrategy,
  cssHiddenStrategy,
  javascriptStrategy,
  countdownStrategy,
  dynamicContentStrategy,
  cloudflareStrategy,
  redirectChainStrategy,
  base64DecodeStrategy,
  urlDecodeStrategy,
  browserAutomationStrategy,
];

export function getStrategy(id: StrategyId): Strategy | undefined {
  return STRATEGIES.find((s) => s.id === id);
}

export type { Strategy, StrategyContext, Extractor } from './types.js';
export { resolved, declined, failed } from './types.js';
export { extractFormTarget } from './html-form.js';
export { extractVisibleLink, countHiddenAnchors } from './css-hidden.js';
export { extractScriptTarget, scriptNavigationTargets } from './javascript.js';
export { detectTimer, extractCountdownTarget } from './countdown.js';
export { findEndpoints, extractJsonLink } from './dynamic-content.js';
export { backoffMs } from './cloudflare.js';
export { nextHop } from './redirect-chain.js';
export { decodeBase64Url, findBase64Target } from './base64-decode.js';
export { decodeNestedUrl, findEncodedTarget } from './url-decode.js';
