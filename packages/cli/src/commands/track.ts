/**
 * Track Command - lexiscan track <domain>
 *
 * Discovers article URLs from a domain's sitemap or feed, scans the ones
 * not stored yet (or the stale ones) and prints a domain summary.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { DISCOVERY_SOURCES, HttpDiscoverer, normalizeBaseUrl, planTrackTargets } from 'lexiscan-core';

import { createOrchestrator, loadContext, readGlobalOptions, withStore } from '../context.js';
import { ExitCode, reportError } from '../exit-codes.js';
import { renderDomainStats, renderFailures, renderSummary } from '../output/report.js';
import { interruptSignal } from '../signals.js';
import { collect, parseConcurrency, parseCount } from '../targets.js';
import { Progress } from '../ui/progress.js';
import { status, withSpinner } from '../ui/spinner.js';

import type { GlobalOptions } from '../context.js';
import type { DiscoverySource } from 'lexiscan-core';

export interface TrackOptions {
  source: DiscoverySource;
  limit: number;
  concurrency?: number;
  exclude: string[];
  rescanStale?: boolean;
  skipExisting: boolean;
}

export function parseSource(value: string): DiscoverySource {
  const source = DISCOVERY_SOURCES.find((s) => s === value);
  if (!source) {
    throw new InvalidArgumentError(`Expected one of: ${DISCOVERY_SOURCES.join(', ')}.`);
  }
  return source;
}

async function trackAction(domain: string, options: TrackOptions, globals: GlobalOptions): Promise<void> {
  const ctx = await loadContext(globals);
  const base = normalizeBaseUrl(domain);
  const host = new URL(base).hostname.toLowerCase();
  const interrupt = interruptSignal(() => {
    status.warning('Interrupted: finishing in-flight targets (press Ctrl+C again to exit now)');
  });

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

    if (discovered.length === 0 && !options.rescanStale) {
      status.error(`No article URLs found on ${host} (tried ${options.source === 'auto' ? 'sitemap and feed' : options.source})`);
      process.exitCode = ExitCode.FAILURE;
      return;
    }

    await withStore(ctx.config, async (store) => {
      const plan = await planTrackTargets(discovered, {
        store,
        versions: ctx.registry.versions(),
        domain: host,
        exclude: options.exclude,
        skipExisting: options.skipExisting,
        rescanStale: options.rescanStale,
        limit: options.limit,
      });

      console.log(
        chalk.gray(
          `${plan.discovered} discovered, ${plan.excluded} excluded, ${plan.alreadyScanned} already scanned` +
            (options.rescanStale ? `, ${plan.stale} stale` : '') +
            `; scanning ${plan.targets.length}`
        )
      );

      if (plan.targets.length > 0) {
        const orchestrator = createOrchestrator(ctx, { store, concurrency: options.concurrency });
        const progress = new Progress({ total: plan.targets.length });
        const report = await orchestrator
          .run(plan.targets, {
            save: true,
            signal: interrupt.signal,
            onOutcome: (outcome, settled) => {
              progress.update(settled, outcome.target);
            },
          })
          .finally(() => progress.stop());

        const failures = renderFailures(report.outcomes);
        if (failures) {
          console.log(chalk.red('Failed targets'));
          process.stdout.write(failures);
        }
        process.stdout.write(renderSummary(report.summary));
      }

      const stats = await store.domainStats(host);
      if (stats) {
        console.log();
        process.stdout.write(renderDomainStats(stats));
      } else {
        status.info(`No stored scans for ${host}`);
      }
    });
  } finally {
    interrupt.dispose();
  }
}

export function registerTrackCommand(program: Command): void {
  program
    .command('track')
    .description('Discover and score the articles of a domain')
    .argument('<domain>', 'Domain or base URL, e.g. example.com')
    .option('--source <source>', 'Where to discover URLs: auto, sitemap or rss', parseSource, 'auto')
    .option('-l, --limit <n>', 'Scan at most N URLs (0 for no limit)', parseCount, 50)
    .option('-c, --concurrency <n>', 'Targets processed at once', parseConcurrency)
    .option('-x, --exclude <substring>', 'Skip URLs containing this text (repeatable)', collect, [])
    .option('--rescan-stale', 'Rescan stored pages scored with older pattern versions')
    .option('--no-skip-existing', 'Rescan pages already in the database')
    .action(async (domain: string, options: TrackOptions, command: Command) => {
      try {
        await trackAction(domain, options, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });
}
