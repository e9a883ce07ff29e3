/**
 * Scan Command - lexiscan scan [targets...] --batch <file>
 *
 * Scores many targets with bounded concurrency. One failing target never
 * stops the batch; failures are listed with the stage they failed at.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

import { createOrchestrator, loadContext, readGlobalOptions, withStore } from '../context.js';
import { ExitCode, reportError } from '../exit-codes.js';
import { outcomeToJson, renderBatchResults, renderFailures, renderSummary } from '../output/report.js';
import { interruptSignal } from '../signals.js';
import { collect, parseConcurrency, readTargetFile } from '../targets.js';
import { Progress } from '../ui/progress.js';
import { status } from '../ui/spinner.js';

import type { CliContext, GlobalOptions } from '../context.js';
import type { BatchReport, BatchSummary, ScanStore } from 'lexiscan-core';

export interface ScanOptions {
  batch?: string;
  concurrency?: number;
  save?: boolean;
  skipExisting: boolean;
  exclude: string[];
  json?: boolean;
}

/**
 * Exit code for a finished batch: failure only when nothing succeeded
 */
export function batchExitCode(summary: BatchSummary): number {
  return summary.succeeded === 0 && summary.failed > 0 ? ExitCode.FAILURE : ExitCode.SUCCESS;
}

async function runBatch(
  ctx: CliContext,
  targets: string[],
  options: ScanOptions,
  store: ScanStore | undefined,
  signal: AbortSignal
): Promise<BatchReport> {
  const orchestrator = createOrchestrator(ctx, { store, concurrency: options.concurrency });
  const progress = new Progress({ total: targets.length, enabled: !options.json && !process.env['CI'] });
  try {
    return await orchestrator.run(targets, {
      save: options.save,
      skipExisting: store !== undefined && options.skipExisting,
      exclude: options.exclude,
      signal,
      onOutcome: (outcome, settled) => {
        progress.update(settled, outcome.target);
      },
    });
  } finally {
    progress.stop();
  }
}

async function scanAction(positional: string[], options: ScanOptions, globals: GlobalOptions): Promise<void> {
  const targets = [...positional, ...(options.batch ? await readTargetFile(options.batch) : [])];
  if (targets.length === 0) {
    throw new InvalidArgumentError('No targets given: pass targets or --batch <file>');
  }

  const ctx = await loadContext(globals);
  const interrupt = interruptSignal(() => {
    status.warning('Interrupted: finishing in-flight targets (press Ctrl+C again to exit now)');
  });

  try {
    const report = options.save
      ? await withStore(ctx.config, (store) => runBatch(ctx, targets, options, store, interrupt.signal))
      : await runBatch(ctx, targets, options, undefined, interrupt.signal);

    if (options.json) {
      console.log(JSON.stringify({ outcomes: report.outcomes.map(outcomeToJson), summary: report.summary }, null, 2));
    } else {
      process.stdout.write(renderBatchResults(report.outcomes));
      const failures = renderFailures(report.outcomes);
      if (failures) {
        console.log();
        console.log(chalk.red('Failed targets'));
        process.stdout.write(failures);
      }
      console.log();
      process.stdout.write(renderSummary(report.summary));
    }

    process.exitCode = batchExitCode(report.summary);
  } finally {
    interrupt.dispose();
  }
}

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Score many URLs or files concurrently')
    .argument('[targets...]', 'URLs or file paths')
    .option('-b, --batch <file>', 'Read targets from a file, one per line')
    .option('-c, --concurrency <n>', 'Targets processed at once', parseConcurrency)
    .option('-s, --save', 'Save results to the database')
    .option('--no-skip-existing', 'Rescan targets already in the database')
    .option('-x, --exclude <substring>', 'Skip targets containing this text (repeatable)', collect, [])
    .option('--json', 'Print outcomes as JSON')
    .action(async (targets: string[], options: ScanOptions, command: Command) => {
      try {
        await scanAction(targets, options, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });
}
