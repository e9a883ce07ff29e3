/**
 * Scan Orchestrator - fetch → extract → detect → score → persist for many
 * targets with bounded concurrency
 *
 * Each target runs its pipeline independently; a failure at any stage ends
 * that target only. Writes go through a single WriteQueue, so every target
 * is persisted by exactly one transaction and cancellation never leaves a
 * half-written target behind.
 *
 * Per-target states:
 *
 *   PENDING → FETCHING → EXTRACTING → DETECTING → SCORING → PERSISTING → PERSISTED
 *                                                        └→ SCORED (save disabled)
 *   any stage → FAILED (with the stage and cause)
 *   PENDING → SKIPPED (excluded, duplicate, already stored) | CANCELLED
 */

import { createTextDocument } from '../detectors/text-document.js';
import { CancelledError, ExtractionError, errorMessage, toError } from '../errors/index.js';
import { filterTargets } from '../extraction/discoverer.js';
import { silentLogger } from '../logging/index.js';
import { WriteQueue } from '../store/write-queue.js';
import { identityFromTarget, identityKey } from '../types/identity.js';

import { withRetry } from './retry.js';
import { WorkerPool } from './worker-pool.js';

import type { ExtractedContent, Extractor } from '../extraction/types.js';
import type { Logger } from '../logging/index.js';
import type { Analyzer } from '../scoring/analyzer.js';
import type { ScanStore } from '../store/scan-store.js';
import type { AnalysisResult, ScanIdentity } from '../types/results.js';

// ============================================================================
// Types
// ============================================================================

export type PipelineStage = 'FETCHING' | 'EXTRACTING' | 'DETECTING' | 'SCORING' | 'PERSISTING';

export type TargetState =
  | 'PENDING'
  | PipelineStage
  | 'PERSISTED'
  | 'SCORED'
  | 'FAILED'
  | 'SKIPPED'
  | 'CANCELLED';

export type SkipReason = 'excluded' | 'duplicate' | 'already-scanned';

interface OutcomeBase {
  target: string;
  identity: ScanIdentity;
}

export type TargetOutcome =
  | (OutcomeBase & { state: 'PERSISTED'; scanId: number; result: AnalysisResult })
  | (OutcomeBase & { state: 'SCORED'; result: AnalysisResult })
  | (OutcomeBase & { state: 'FAILED'; stage: PipelineStage; error: Error })
  | (OutcomeBase & { state: 'SKIPPED'; reason: SkipReason })
  | (OutcomeBase & { state: 'CANCELLED' });

export interface BatchSummary {
  total: number;
  /** PERSISTED or SCORED */
  succeeded: number;
  failed: number;
  /** SKIPPED or CANCELLED */
  skipped: number;
  cancelled: number;
  durationMs: number;
}

export interface BatchReport {
  /** One outcome per input target, in input order */
  outcomes: TargetOutcome[];
  summary: BatchSummary;
}

export interface ScanOrchestratorOptions {
  analyzer: Analyzer;
  extractor: Extractor;
  /** Required when running with `save` */
  store?: ScanStore | undefined;
  logger?: Logger | undefined;
  /** @default 10 */
  concurrency?: number | undefined;
  /** @default 2 */
  maxRetries?: number | undefined;
  /** @default 500 */
  retryBaseDelayMs?: number | undefined;
  /** Clock for scanned_at timestamps */
  now?: (() => Date) | undefined;
}

export interface RunOptions {
  /** Persist each successful result */
  save?: boolean | undefined;
  /** Targets containing any of these substrings are skipped before fetching */
  exclude?: readonly string[] | undefined;
  /** Skip targets the store already holds */
  skipExisting?: boolean | undefined;
  signal?: AbortSignal | undefined;
  onStateChange?: ((target: string, state: TargetState) => void) | undefined;
  onOutcome?: ((outcome: TargetOutcome, settled: number, total: number) => void) | undefined;
}

class StageError extends Error {
  constructor(
    public readonly stage: PipelineStage,
    public readonly original: Error
  ) {
    super(original.message);
    this.name = 'StageError';
  }
}

interface PlannedTarget {
  target: string;
  identity: ScanIdentity;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ScanOrchestrator {
  private readonly analyzer: Analyzer;
  private readonly extractor: Extractor;
  private readonly store: ScanStore | undefined;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly now: () => Date;
  private readonly writeQueue = new WriteQueue();

  constructor(options: ScanOrchestratorOptions) {
    this.analyzer = options.analyzer;
    this.extractor = options.extractor;
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.concurrency = options.concurrency ?? 10;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the pipeline over `targets`. Never rejects because of a single
   * target; per-target failures are reported in the outcomes.
   */
  async run(targets: readonly string[], options: RunOptions = {}): Promise<BatchReport> {
    const startedAt = Date.now();
    const save = options.save ?? false;
    const skipExisting = options.skipExisting ?? false;
    if ((save || skipExisting) && !this.store) {
      throw new Error('A store is required to save results or skip existing targets');
    }

    const total = targets.length;
    const slots: Array<TargetOutcome | undefined> = new Array<TargetOutcome | undefined>(total).fill(undefined);
    let settled = 0;
    const record = (index: number, outcome: TargetOutcome): void => {
      slots[index] = outcome;
      settled++;
      options.onStateChange?.(outcome.target, outcome.state);
      options.onOutcome?.(outcome, settled, total);
    };

    // Exclusions and duplicates are resolved before anything is fetched
    const kept = new Set(filterTargets(targets, options.exclude ?? []));
    const seen = new Set<string>();
    const planned: Array<PlannedTarget & { index: number }> = [];
    targets.forEach((target, index) => {
      const identity = identityFromTarget(target);
      const key = identityKey(identity);
      if (!kept.has(target)) {
        record(index, { target, identity, state: 'SKIPPED', reason: 'excluded' });
      } else if (seen.has(key)) {
        record(index, { target, identity, state: 'SKIPPED', reason: 'duplicate' });
      } else {
        seen.add(key);
        planned.push({ target, identity, index });
        options.onStateChange?.(target, 'PENDING');
      }
    });

    const pool = new WorkerPool<PlannedTarget & { index: number }, TargetOutcome>({ maxWorkers: this.concurrency });
    pool.setProcessor((item) => this.processTarget(item, { ...options, save, skipExisting }));

    // Outcomes are recorded as each target settles; slots keep input order
    pool.onTaskSettled((taskResult) => {
      const item = planned[taskResult.index];
      if (!item) {return;}
      const { target, identity } = item;
      if (taskResult.status === 'completed') {
        record(item.index, taskResult.result);
      } else if (taskResult.status === 'cancelled') {
        record(item.index, { target, identity, state: 'CANCELLED' });
      } else {
        // processTarget resolves with an outcome; a rejection here is unexpected
        record(item.index, { target, identity, state: 'FAILED', stage: 'FETCHING', error: taskResult.error });
      }
    });
    await pool.processBatch(planned, { signal: options.signal });
    const stats = pool.getStats();
    this.logger.debug(
      `Processed ${planned.length} targets on ${stats.maxWorkers} workers ` +
        `(${stats.cancelledTasks} cancelled, ${Math.round(stats.averageDuration)} ms average)`
    );

    await this.writeQueue.drain();

    const outcomes = slots.filter((o): o is TargetOutcome => o !== undefined);
    return { outcomes, summary: summarize(outcomes, Date.now() - startedAt) };
  }

  /**
   * Full pipeline for one target. Resolves with its terminal outcome.
   */
  private async processTarget(
    item: PlannedTarget,
    options: RunOptions & { save: boolean; skipExisting: boolean }
  ): Promise<TargetOutcome> {
    const { target, identity } = item;
    const { signal } = options;
    const enter = (state: TargetState): void => {
      if (signal?.aborted) {throw new CancelledError();}
      options.onStateChange?.(target, state);
    };

    try {
      if (options.skipExisting && this.store) {
        const scanned = await this.store.isScanned(identity).catch((error: unknown) => {
          throw new StageError('PERSISTING', toError(error));
        });
        if (scanned) {
          return { target, identity, state: 'SKIPPED', reason: 'already-scanned' };
        }
      }

      enter('FETCHING');
      const content = await this.fetch(identity, signal);

      enter('EXTRACTING');
      const document = runStage('EXTRACTING', () => createTextDocument(content.text));

      enter('DETECTING');
      const detection = runStage('DETECTING', () => this.analyzer.detect(document));

      enter('SCORING');
      const score = runStage('SCORING', () => this.analyzer.score(detection.results));

      const result: AnalysisResult = {
        identity,
        wordCount: document.wordCount,
        title: content.title,
        publishedDate: content.publishedDate,
        patternResults: detection.results,
        warnings: detection.warnings,
        scannedAt: this.now().toISOString(),
        ...score,
      };

      if (!options.save || !this.store) {
        return { target, identity, state: 'SCORED', result };
      }

      enter('PERSISTING');
      const store = this.store;
      const scanId = await this.writeQueue
        .enqueue(async () => {
          // Last chance to drop the write; once started it commits or rolls back whole
          if (signal?.aborted) {throw new CancelledError();}
          return store.saveResult(result);
        })
        .catch((error: unknown) => {
          if (error instanceof CancelledError) {throw error;}
          throw new StageError('PERSISTING', toError(error));
        });

      return { target, identity, state: 'PERSISTED', scanId, result };
    } catch (error) {
      if (error instanceof CancelledError) {
        this.logger.debug(`Cancelled ${target}`);
        return { target, identity, state: 'CANCELLED' };
      }
      const stageError = error instanceof StageError ? error : new StageError('FETCHING', toError(error));
      this.logger.warn(`${target}: ${stageError.stage.toLowerCase()} failed: ${errorMessage(stageError.original)}`);
      return { target, identity, state: 'FAILED', stage: stageError.stage, error: stageError.original };
    }
  }

  private async fetch(identity: ScanIdentity, signal: AbortSignal | undefined): Promise<ExtractedContent> {
    try {
      return await withRetry(() => this.extractor.extract(identity, { signal }), {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryBaseDelayMs,
        signal,
        onRetry: (error, attempt, delayMs) =>
          this.logger.info(
            `Retrying ${identityKey(identity)} (attempt ${attempt + 1}) in ${delayMs} ms: ${errorMessage(error)}`
          ),
      });
    } catch (error) {
      if (error instanceof CancelledError) {throw error;}
      const cause = toError(error);
      throw new StageError(cause instanceof ExtractionError ? 'EXTRACTING' : 'FETCHING', cause);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function runStage<T>(stage: PipelineStage, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new StageError(stage, toError(error));
  }
}

export function summarize(outcomes: readonly TargetOutcome[], durationMs = 0): BatchSummary {
  const summary: BatchSummary = { total: outcomes.length, succeeded: 0, failed: 0, skipped: 0, cancelled: 0, durationMs };
  for (const outcome of outcomes) {
    switch (outcome.state) {
      case 'PERSISTED':
      case 'SCORED':
        summary.succeeded++;
        break;
      case 'FAILED':
        summary.failed++;
        break;
      case 'CANCELLED':
        summary.cancelled++;
        summary.skipped++;
        break;
      case 'SKIPPED':
        summary.skipped++;
        break;
    }
  }
  return summary;
}
