/**
 * Console logging with the project prefix.
 * Debug output is opt-in through the DEBUG environment variable.
 */

const PREFIX = '[linkthru]';

export function debug(...args: unknown[]): void {
  if (process.env.DEBUG) console.debug(PREFIX, ...args);
}

export function warn(...args: unknown[]): void {
  console.warn(PREFIX, ...args);
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
