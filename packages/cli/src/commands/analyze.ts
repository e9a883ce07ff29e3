/**
 * Analyze Command - lexiscan analyze <target>
 *
 * Scores one URL or file. Failures surface as the specific error and exit 1.
 */

import { Command } from 'commander';
import { CancelledError, compareModelProfile, loadModelProfile } from 'lexiscan-core';

import { createOrchestrator, loadContext, readGlobalOptions, withStore } from '../context.js';
import { reportError } from '../exit-codes.js';
import { analysisToJson, renderAnalysis } from '../output/report.js';
import { interruptSignal } from '../signals.js';
import { createSpinner } from '../ui/spinner.js';

import type { CliContext, GlobalOptions } from '../context.js';
import type { AnalysisResult, BatchReport, ScanStore } from 'lexiscan-core';

export interface AnalyzeOptions {
  save?: boolean;
  json?: boolean;
  compareModel?: string;
}

/**
 * Run the pipeline for a single target and return its result, throwing the
 * target's error when it fails
 */
export async function analyzeTarget(
  ctx: CliContext,
  target: string,
  options: { store?: ScanStore; save?: boolean; signal?: AbortSignal; quiet?: boolean }
): Promise<AnalysisResult> {
  const spinner = createSpinner({ text: `Analyzing ${target}`, enabled: !options.quiet && !process.env['CI'] });
  spinner.start();

  const orchestrator = createOrchestrator(ctx, { store: options.store, concurrency: 1 });
  let report: BatchReport;
  try {
    report = await orchestrator.run([target], { save: options.save, signal: options.signal });
  } catch (error) {
    spinner.stop();
    throw error;
  }
  const outcome = report.outcomes[0];
  if (!outcome) {
    spinner.stop();
    throw new Error(`No outcome for ${target}`);
  }

  switch (outcome.state) {
    case 'PERSISTED':
    case 'SCORED':
      spinner.succeed(outcome.state === 'PERSISTED' ? `Analyzed and saved ${target}` : `Analyzed ${target}`);
      return outcome.result;
    case 'FAILED':
      spinner.fail(`${outcome.stage.toLowerCase()} failed for ${target}`);
      throw outcome.error;
    case 'SKIPPED':
    case 'CANCELLED':
      spinner.fail(`Analysis of ${target} was cancelled`);
      throw new CancelledError(`Analysis of ${target} was cancelled`);
  }
}

async function analyzeAction(target: string, options: AnalyzeOptions, globals: GlobalOptions): Promise<void> {
  const ctx = await loadContext(globals);
  const profile = options.compareModel
    ? { name: options.compareModel, values: await loadModelProfile(ctx.config.patternsDir, options.compareModel) }
    : undefined;

  const interrupt = interruptSignal();
  try {
    const quiet = options.json ?? false;
    const { result, percentile } = options.save
      ? await withStore(ctx.config, async (store) => {
          const saved = await analyzeTarget(ctx, target, { store, save: true, signal: interrupt.signal, quiet });
          return { result: saved, percentile: await store.corpusPercentile(saved.index) };
        })
      : { result: await analyzeTarget(ctx, target, { signal: interrupt.signal, quiet }), percentile: undefined };

    const comparison = profile ? compareModelProfile(result.patternResults, profile.values) : undefined;

    if (options.json) {
      const json = {
        ...analysisToJson(result),
        ...(percentile !== undefined ? { corpusPercentile: percentile } : {}),
        ...(profile && comparison ? { model: { name: profile.name, ...comparison } } : {}),
      };
      console.log(JSON.stringify(json, null, 2));
      return;
    }

    process.stdout.write(
      renderAnalysis(result, {
        verbose: globals.verbose ?? false,
        percentile,
        profile: profile && comparison ? { name: profile.name, comparison } : undefined,
      })
    );
  } finally {
    interrupt.dispose();
  }
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Score a single URL or file')
    .argument('<target>', 'URL or path to a .txt, .md or .html file')
    .option('-s, --save', 'Save the result to the database')
    .option('--json', 'Print the result as JSON')
    .option('--compare-model <name>', 'Compare pattern scores against a model profile')
    .action(async (target: string, options: AnalyzeOptions, command: Command) => {
      try {
        await analyzeAction(target, options, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });
}
