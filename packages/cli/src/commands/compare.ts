/**
 * Compare Command - lexiscan compare <targets...>
 *
 * Scores several targets side by side without saving them.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { deltaVector, identityKey, rankResults } from 'lexiscan-core';

import { createOrchestrator, loadContext, readGlobalOptions } from '../context.js';
import { ExitCode, reportError } from '../exit-codes.js';
import { analysisToJson, categoryRows, formatLabel, renderFailures } from '../output/report.js';
import { formatTable } from '../output/table.js';
import { interruptSignal } from '../signals.js';
import { withSpinner } from '../ui/spinner.js';

import type { GlobalOptions } from '../context.js';
import type { AnalysisResult } from 'lexiscan-core';

export type CompareSort = 'score' | 'target';

export interface CompareOptions {
  sort: CompareSort;
  json?: boolean;
}

export function parseSort(value: string): CompareSort {
  if (value === 'score' || value === 'target') {return value;}
  throw new InvalidArgumentError('Expected "score" or "target".');
}

/**
 * Order results for display: by index (highest first) or by target
 */
export function sortResults(results: readonly AnalysisResult[], sort: CompareSort): AnalysisResult[] {
  if (sort === 'score') {return rankResults(results);}
  return [...results].sort((a, b) => identityKey(a.identity).localeCompare(identityKey(b.identity)));
}

/**
 * Rows for the comparison table: one per target, one column per category
 */
export function comparisonRows(results: readonly AnalysisResult[]): Array<Record<string, unknown>> {
  return results.map((r, i) => {
    const row: Record<string, unknown> = {
      '#': i + 1,
      target: identityKey(r.identity),
      index: r.index,
      label: formatLabel(r.label),
    };
    for (const { category, score } of categoryRows(r.categoryScores)) {
      row[category] = score;
    }
    return row;
  });
}

async function compareAction(targets: string[], options: CompareOptions, globals: GlobalOptions): Promise<void> {
  if (targets.length < 2) {
    throw new InvalidArgumentError('compare needs at least two targets');
  }

  const ctx = await loadContext(globals);
  const interrupt = interruptSignal();
  try {
    const orchestrator = createOrchestrator(ctx);
    const report = await withSpinner(
      `Analyzing ${targets.length} targets`,
      () => orchestrator.run(targets, { signal: interrupt.signal }),
      { enabled: !options.json, successText: (r) => `Analyzed ${r.summary.succeeded}/${r.summary.total} targets` }
    );

    const results = report.outcomes.flatMap((o) => (o.state === 'SCORED' || o.state === 'PERSISTED' ? [o.result] : []));
    const sorted = sortResults(results, options.sort);
    const [first, second] = results;
    const delta = results.length === 2 && first && second ? deltaVector(first, second) : undefined;

    if (options.json) {
      console.log(JSON.stringify({ results: sorted.map(analysisToJson), ...(delta ? { delta } : {}) }, null, 2));
    } else {
      const columns = ['#', 'target', 'index', 'label', ...new Set(sorted.flatMap((r) => categoryRows(r.categoryScores).map((c) => c.category)))];
      process.stdout.write(formatTable(comparisonRows(sorted), columns));

      if (delta && first && second) {
        console.log();
        console.log(chalk.bold(`Category delta (${identityKey(first.identity)} − ${identityKey(second.identity)})`));
        process.stdout.write(formatTable(Object.entries(delta).map(([category, diff]) => ({ category, delta: diff }))));
      }

      const failures = renderFailures(report.outcomes);
      if (failures) {
        console.log();
        console.log(chalk.red('Failed targets'));
        process.stdout.write(failures);
      }
    }

    if (report.summary.failed > 0) {
      process.exitCode = ExitCode.FAILURE;
    }
  } finally {
    interrupt.dispose();
  }
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Score several targets side by side')
    .argument('<targets...>', 'Two or more URLs or files')
    .option('--sort <order>', 'Sort by "score" or "target"', parseSort, 'score')
    .option('--json', 'Print results as JSON')
    .action(async (targets: string[], options: CompareOptions, command: Command) => {
      try {
        await compareAction(targets, options, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });
}
