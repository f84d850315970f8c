/**
 * Browser identity for outgoing requests.
 *
 * Gate sites serve different markup (or a challenge) to obvious bots, so every
 * request carries a current desktop Chrome user agent, and the Cloudflare
 * strategy adds the matching client-hint headers a real Chrome would send.
 */

const CHROME_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/135.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/135.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36',
];

export const DEFAULT_USER_AGENT = CHROME_USER_AGENTS[2] ?? '';

export function getRealisticUserAgent(): string {
  const idx = Math.floor(Math.random() * CHROME_USER_AGENTS.length);
  return CHROME_USER_AGENTS[idx] ?? DEFAULT_USER_AGENT;
}

/** Chrome major version in a UA string, 136 when none is recognizable. */
export function chromeVersion(userAgent: string): number {
  const match = userAgent.match(/Chrome\/(\d+)/i);
  return match?.[1] ? parseInt(match[1], 10) : 136;
}

/**
 * Sec-CH-UA value matching the UA's Chrome version. The "Not A Brand" token
 * rotates between Chrome releases, so it has to follow the version.
 */
export function getSecCHUA(userAgent: string): string {
  const version = chromeVersion(userAgent);
  let notABrand: string;
  if (version >= 136) {
    notABrand = '"Not.A/Brand";v="24"';
  } else if (version >= 134) {
    notABrand = '"Not)A;Brand";v="99"';
  } else {
    notABrand = '"Not_A Brand";v="8"';
  }
  return `"Chromium";v="${version}", "Google Chrome";v="${version}", ${notABrand}`;
}

export function getSecCHUAPlatform(userAgent: string): string {
  if (userAgent.includes('Windows')) return '"Windows"';
  if (userAgent.includes('Macintosh')) return '"macOS"';
  if (userAgent.includes('Linux')) return '"Linux"';
  return '"Unknown"';
}

/** Navigation headers a desktop Chrome sends for a top-level document load. */
export function browserHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Upgrade-Insecure-Requests': '1',
  };
}

/** Full client-hint set, used when replaying a page behind a challenge. */
export function clientHintHeaders(userAgent: string): Record<string, string> {
  return {
    ...browserHeaders(userAgent),
    'Sec-CH-UA': getSecCHUA(userAgent),
    'Sec-CH-UA-Mobile': '?0',
    'Sec-CH-UA-Platform': getSecCHUAPlatform(userAgent),
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Cache-Control': 'max-age=0',
  };
}
