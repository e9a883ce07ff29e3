/**
 * Patterns Command - lexiscan patterns
 *
 * Inspect the loaded pattern registry and how stored scans line up with it.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { PATTERN_CATEGORIES, identityKey } from 'lexiscan-core';

import { loadContext, readGlobalOptions, withStore } from '../context.js';
import { ExitCode, reportError } from '../exit-codes.js';
import { formatKeyValue, formatTable } from '../output/table.js';

import type { GlobalOptions } from '../context.js';
import type { PatternCategory, PatternDefinition, PatternVersionCount, PatternVersions } from 'lexiscan-core';

export function parseCategory(value: string): PatternCategory {
  const category = PATTERN_CATEGORIES.find((c) => c === value);
  if (!category) {
    throw new InvalidArgumentError(`Expected one of: ${PATTERN_CATEGORIES.join(', ')}.`);
  }
  return category;
}

export function patternRows(patterns: readonly PatternDefinition[]): Array<Record<string, unknown>> {
  return patterns.map((p) => ({
    id: p.id,
    version: p.version,
    category: p.category,
    type: p.detectionType,
    weight: p.weight,
    enabled: p.enabled ? 'yes' : 'no',
    name: p.name,
  }));
}

/**
 * One row per pattern id seen in the registry or the store. A pattern is
 * stale when some stored scans carry a version below the registry's.
 */
export function versionRows(
  registry: PatternVersions,
  stored: readonly PatternVersionCount[]
): Array<Record<string, unknown>> {
  const ids = [...new Set([...Object.keys(registry), ...stored.map((s) => s.patternId)])].sort();
  return ids.map((id) => {
    const current = registry[id];
    const counts = stored.filter((s) => s.patternId === id).sort((a, b) => a.patternVersion - b.patternVersion);
    const outdated = current === undefined ? 0 : counts.filter((c) => c.patternVersion < current).reduce((n, c) => n + c.scans, 0);
    return {
      pattern: id,
      registry: current ?? '-',
      stored: counts.length === 0 ? '-' : counts.map((c) => `v${c.patternVersion}×${c.scans}`).join(' '),
      status: current === undefined ? 'not loaded' : outdated > 0 ? `${outdated} stale` : 'current',
    };
  });
}

function describeParams(pattern: PatternDefinition): Array<readonly [string, unknown]> {
  switch (pattern.detectionType) {
    case 'frequency':
      return [
        ['Terms', pattern.params.terms.join(', ')],
        ['Match mode', pattern.params.matchMode],
        ['Per words', pattern.params.perNWords],
      ];
    case 'regex':
      return [
        ['Patterns', pattern.params.patterns.join('  ')],
        ['Per words', pattern.params.perNWords],
      ];
    case 'structural':
      return [
        ['Metric', pattern.params.metric],
        ['Min paragraphs', pattern.params.minParagraphs],
      ];
    case 'linguistic':
      return [
        ['Metric', pattern.params.metric],
        ['Window', pattern.params.window],
        ['Min sentences', pattern.params.minSentences],
        ['Inverted', pattern.params.invert ? 'yes' : 'no'],
      ];
  }
}

async function listAction(options: { category?: PatternCategory }, globals: GlobalOptions): Promise<void> {
  const { registry } = await loadContext(globals);
  process.stdout.write(formatTable(patternRows(registry.all(options.category))));
}

async function showAction(id: string, globals: GlobalOptions): Promise<void> {
  const { registry } = await loadContext(globals);
  const pattern = registry.lookup(id);
  if (!pattern) {
    console.error(chalk.red(`Unknown pattern: ${id}`));
    process.exitCode = ExitCode.FAILURE;
    return;
  }

  console.log(chalk.bold(`${pattern.name} (${pattern.id} v${pattern.version})`));
  if (pattern.description) {
    console.log(pattern.description);
  }
  console.log();
  process.stdout.write(
    formatKeyValue([
      ['Category', pattern.category],
      ['Detection', pattern.detectionType],
      ['Weight', pattern.weight],
      ['Severity', pattern.severity],
      ['Enabled', pattern.enabled ? 'yes' : 'no'],
      ['Thresholds', `${pattern.params.thresholdLow} – ${pattern.params.thresholdHigh}`],
      ...describeParams(pattern),
      ...(pattern.addedBy ? [['Added by', pattern.addedBy] as const] : []),
      ...(pattern.references.length > 0 ? [['References', pattern.references.join(', ')] as const] : []),
      ['Source', pattern.source],
    ])
  );
}

async function versionsAction(globals: GlobalOptions): Promise<void> {
  const ctx = await loadContext(globals);
  const versions = ctx.registry.versions();

  await withStore(ctx.config, async (store) => {
    const summary = await store.patternVersionSummary();
    process.stdout.write(formatTable(versionRows(versions, summary)));

    const stale = await store.staleScans(versions);
    console.log();
    if (stale.length === 0) {
      console.log(chalk.green('All stored scans are current.'));
      return;
    }
    console.log(chalk.yellow(`${stale.length} stale scans:`));
    for (const identity of stale) {
      console.log(`  ${identityKey(identity)}`);
    }
  });
}

export function registerPatternsCommand(program: Command): void {
  const patterns = program.command('patterns').description('Inspect the pattern registry');

  patterns
    .command('list')
    .description('List loaded patterns')
    .option('--category <category>', 'Only patterns of this category', parseCategory)
    .action(async (options: { category?: PatternCategory }, command: Command) => {
      try {
        await listAction(options, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });

  patterns
    .command('show')
    .description('Show one pattern definition')
    .argument('<id>', 'Pattern id')
    .action(async (id: string, _options: unknown, command: Command) => {
      try {
        await showAction(id, readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });

  patterns
    .command('versions')
    .description('Compare registry versions with stored scans and list stale scans')
    .action(async (_options: unknown, command: Command) => {
      try {
        await versionsAction(readGlobalOptions(command.optsWithGlobals()));
      } catch (error) {
        reportError(error);
      }
    });
}
