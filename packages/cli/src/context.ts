/**
 * CLI context - config, registry and analyzer shared by every command
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  Analyzer,
  ConfigLoader,
  SQLiteScanStore,
  ScanOrchestrator,
  StylisticScorer,
  createConsoleLogger,
  createExtractor,
  loadPatternRegistry,
} from 'lexiscan-core';

import type { Extractor, LexiscanConfig, Logger, PatternRegistry, ScanStore } from 'lexiscan-core';

export interface GlobalOptions {
  db?: string | undefined;
  patterns?: string | undefined;
  verbose?: boolean | undefined;
}

export interface CliContext {
  config: LexiscanConfig;
  registry: PatternRegistry;
  scorer: StylisticScorer;
  analyzer: Analyzer;
  extractor: Extractor;
  logger: Logger;
}

/**
 * Read the global flags out of commander's untyped option bag
 */
export function readGlobalOptions(values: Record<string, unknown>): GlobalOptions {
  return {
    db: typeof values['db'] === 'string' ? values['db'] : undefined,
    patterns: typeof values['patterns'] === 'string' ? values['patterns'] : undefined,
    verbose: values['verbose'] === true,
  };
}

export async function loadContext(globals: GlobalOptions, rootDir: string = process.cwd()): Promise<CliContext> {
  const { config: loaded } = await new ConfigLoader({ rootDir }).load();
  const config: LexiscanConfig = {
    ...loaded,
    patternsDir: globals.patterns ? path.resolve(rootDir, globals.patterns) : loaded.patternsDir,
    dbPath: globals.db ? path.resolve(rootDir, globals.db) : loaded.dbPath,
  };

  const logger = createConsoleLogger(globals.verbose ? 'debug' : 'warn');
  const registry = await loadPatternRegistry(config.patternsDir);
  logger.debug(`Loaded ${registry.size} patterns from ${config.patternsDir}`);

  const scorer = new StylisticScorer({ categoryWeights: config.categoryWeights, labels: config.labels });
  const analyzer = new Analyzer(registry, { scorer, logger });
  const extractor = createExtractor({
    timeoutMs: config.scan.fetchTimeoutMs,
    minWords: config.scan.minWords,
    userAgent: config.scan.userAgent,
  });

  return { config, registry, scorer, analyzer, extractor, logger };
}

/**
 * Open the store, run `fn`, and close the store whatever happens
 */
export async function withStore<T>(config: LexiscanConfig, fn: (store: SQLiteScanStore) => Promise<T>): Promise<T> {
  if (config.dbPath !== ':memory:') {
    await fs.mkdir(path.dirname(config.dbPath), { recursive: true });
  }
  const store = new SQLiteScanStore({ dbPath: config.dbPath });
  await store.initialize();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Orchestrator wired to the context's analyzer, extractor and scan settings
 */
export function createOrchestrator(
  ctx: CliContext,
  options: { store?: ScanStore | undefined; concurrency?: number | undefined } = {}
): ScanOrchestrator {
  return new ScanOrchestrator({
    analyzer: ctx.analyzer,
    extractor: ctx.extractor,
    store: options.store,
    logger: ctx.logger,
    concurrency: options.concurrency ?? ctx.config.scan.concurrency,
    maxRetries: ctx.config.scan.maxRetries,
    retryBaseDelayMs: ctx.config.scan.retryBaseDelayMs,
  });
}
