/**
 * lexiscan CLI
 *
 * Builds the commander program; `bin/lexiscan.ts` parses argv with it.
 */

import { Command } from 'commander';
import { VERSION } from 'lexiscan-core';

import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerCompareCommand } from './commands/compare.js';
import { registerDiscoverCommand } from './commands/discover.js';
import { registerPatternsCommand } from './commands/patterns.js';
import { registerScanCommand } from './commands/scan.js';
import { registerTrackCommand } from './commands/track.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('lexiscan')
    .description('Score text for stylistic anomalies typical of machine-generated prose')
    .version(VERSION)
    .option('--db <path>', 'SQLite database path (default: .lexiscan/lexiscan.db)')
    .option('--patterns <dir>', 'Pattern definitions directory')
    .option('-v, --verbose', 'Show per-pattern detail and debug logging');

  registerAnalyzeCommand(program);
  registerCompareCommand(program);
  registerScanCommand(program);
  registerDiscoverCommand(program);
  registerTrackCommand(program);
  registerPatternsCommand(program);

  return program;
}

export { analyzeTarget } from './commands/analyze.js';
export type { CliContext, GlobalOptions } from './context.js';
