/**
 * Discover Command - lexiscan discover <domain>
 *
 * Lists a domain's article URLs from its sitemap or feed, one per line, so
 * they can be fed to `lexiscan scan --batch`.
 */

import * as fs from 'node:fs/promises';

import { Command } from 'commander';
import { HttpDiscoverer, filterTargets, normalizeBaseUrl } from 'lexiscan-core';

import { loadContext, readGlobalOptions } from '../context.js';
import { ExitCode, reportError } from '../exit-codes.js';
import { interruptSignal } from '../signals.js';
import { collect, parseCount } from '../targets.js';
import { status, withSpinner } from '../ui/spinner.js';
import { parseSource } from './track.js';

import type { GlobalOptions } from '../context.js';
import type { DiscoverySource } from 'lexiscan-core';

export interface DiscoverOptions {
  source: DiscoverySource;
  limit: number;
  output?: string;
  exclude: string[];
}

/**
 * Drop excluded URLs, then keep the first `limit` (0 keeps all)
 */
export function selectUrls(urls: readonly string[], options: { exclude: readonly string[]; limit: number }): string[] {
  const kept = filterTargets(urls, options.exclude);
  return options.limit > 0 ? kept.slice(0, options.limit) : kept;
}

async function discoverAction(domain: string, options: DiscoverOptions, globals: GlobalOptions): Promise<void> {
  const ctx = await loadContext(globals);
  const base = normalizeBaseUrl(domain);
  const host = new URL(base).hostname.toLowerCase();
  const interrupt = interruptSignal();

  try {
    const discoverer = new HttpDiscoverer({
      timeoutMs: ctx.config.scan.fetchTimeoutMs,
      userAgent: ctx.config.scan.userAgent,
      logger: ctx.logger,
    });
    const discovered = await withSpinner(
      `Discovering URLs on ${host}`,
      () => discoverer.discover(base, options.source, { signal: interrupt.signal }),
      { successText: (urls) => `Discovered ${urls.length} URLs on ${host}` }
    );

    if (discovered.length === 0) {
      status.error(`No article URLs found on ${host} (tried ${options.source === 'auto' ? 'sitemap and feed' : options.source})`);
      process.exitCode = ExitCode.FAILURE;
      return;
    }

    const urls = selectUrls(discovered, options);
    if (options.output) {
      await fs.writeFile(options.output, urls.map((u) => `${u}\n`).join(''), 'utf-8');
      status.success(`Saved ${urls.length} URLs to ${options.output}`);
    } else {
      process.stdout.write(urls.map((u) => `${u}\n`).join(''));
    }
  } finally {
    interrupt.dispose();
  }
}

export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover')
    .description('List the article URLs of a domain')
    .argument('<domain>', 'Domain or base URL, e.g. example.com')
    .option('--source <source>', 'Where to discover URLs: auto, sitemap or rss', parseSource, 'auto')
    .option('-l, --limit <n>', 'List at most N URLs (0 for no limit)', parseCount, 0)
    .option('-o, --output <file>', 'Write the URLs to a file instead of stdout')
    .option('-x, --exclude <substring>', 'Skip URLs containing this text (repeatable)', collect, [])
    .action(async (domain: string, options: DiscoverOptions, command: Command) => {
      try {
        await discoverAction(domain, options, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });
}
