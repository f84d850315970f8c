#!/usr/bin/env node

/**
 * linkthru CLI
 *
 * Usage:
 *   linkthru <url>                     - Resolve a gate link to its destination
 *   linkthru <url> --json              - Output the full result as JSON
 *   linkthru <url> --timeout 20000     - Give up after 20s
 *   linkthru strategies                - List strategies in priority order
 *   linkthru sites                     - List registered gate domains
 */

import { Command } from 'commander';
import ora from 'ora';
import { readFileSync } from 'node:fs';
import { createResolver, cleanup } from './index.js';
import type { Resolver } from './core/pipeline.js';
import { STRATEGIES } from './core/strategies/index.js';
import { SiteRegistry, parseStrategyList } from './core/site-registry.js';
import { LinkthruError, type ResolutionResult } from './types.js';
import { errorMessage } from './core/log.js';

const program: Command = new Command();

// Read version from package.json dynamically
let cliVersion = '0.0.0';
try {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    cliVersion = pkg.version;
  }
} catch { /* fallback */ }

function parsePositiveInt(name: string) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
      throw new LinkthruError(`${name} must be a positive integer, got "${value}"`, 'INVALID_OPTION');
    }
    return n;
  };
}

function printResult(result: ResolutionResult): void {
  if (result.destination === null) return;
  console.log(result.destination);
  const via = result.provenance === 'cache' ? 'cache' : result.strategy ?? 'unknown';
  console.error(`  via ${via}, ${result.hops} hop${result.hops === 1 ? '' : 's'}, ${result.elapsedMs}ms`);
}

function printAttempts(result: ResolutionResult): void {
  for (const attempt of result.attempts) {
    console.error(`  ${attempt.outcome.padEnd(8)} ${attempt.strategy}${attempt.detail ? ` (${attempt.detail})` : ''}`);
  }
}

program
  .name('linkthru')
  .description('Resolve ad-gate shortlinks to their final destination')
  .version(cliVersion)
  .argument('[url]', 'Gate link to resolve')
  .option('--json', 'Output the result as JSON')
  .option('-t, --timeout <ms>', 'Total time budget in milliseconds', parsePositiveInt('--timeout'))
  .option('--max-hops <n>', 'Gate hops to follow before giving up', parsePositiveInt('--max-hops'))
  .option('--strategies <ids>', 'Comma-separated strategy ids to allow')
  .option('--no-cache', 'Bypass the link cache')
  .option('-s, --silent', 'Silent mode (no spinner)')
  .action(async (url: string | undefined, options: {
    json?: boolean;
    timeout?: number;
    maxHops?: number;
    strategies?: string;
    cache: boolean;
    silent?: boolean;
  }) => {
    if (!url) {
      program.help();
    }

    const quiet = options.silent || options.json;
    const spinner = quiet ? null : ora('Resolving...').start();
    let resolver: Resolver | null = null;

    try {
      resolver = createResolver();
      const result = await resolver.resolve(url, {
        budgetMs: options.timeout,
        maxHops: options.maxHops,
        strategies: options.strategies ? parseStrategyList(options.strategies.split(','), '--strategies') : undefined,
        noCache: !options.cache,
      });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (result.destination !== null) {
        spinner?.succeed('Resolved');
        printResult(result);
      } else {
        spinner?.fail(result.error?.message ?? 'Could not resolve this link');
        printAttempts(result);
      }
      process.exitCode = result.destination !== null ? 0 : 1;
    } catch (e) {
      if (spinner) {
        spinner.fail(errorMessage(e));
      } else {
        console.error(`Error: ${errorMessage(e)}`);
      }
      process.exitCode = 1;
    } finally {
      await resolver?.close();
      await cleanup();
    }
  });

program
  .command('strategies')
  .description('List bypass strategies in the order they are tried')
  .action(() => {
    STRATEGIES.forEach((strategy, i) => {
      const browser = strategy.id === 'browser-automation' ? '  (needs a browser)' : '';
      console.log(`${String(i + 1).padStart(2)}. ${strategy.id.padEnd(20)} ${strategy.name}${browser}`);
    });
  });

program
  .command('sites')
  .description('List registered gate domains')
  .action(() => {
    for (const site of SiteRegistry.loadDefault().list()) {
      const only = site.strategies ? `  [${[...site.strategies].join(', ')}]` : '';
      console.log(`${site.domain}${only}`);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`Error: ${errorMessage(e)}`);
  process.exitCode = 1;
});
