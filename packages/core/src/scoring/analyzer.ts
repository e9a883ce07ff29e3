/**
 * Analyzer - runs the detector set over a document and scores the results
 *
 * Detection and scoring are separate steps so callers can track them as
 * distinct pipeline stages. Every enabled pattern yields exactly one result;
 * a DetectionError turns into a 0 score plus a warning.
 */

import { createTextDocument } from '../detectors/text-document.js';
import { DetectorSet } from '../detectors/detector-set.js';
import { DetectionError } from '../errors/index.js';
import { silentLogger } from '../logging/logger.js';

import { normalizeScore } from './normalize.js';
import { StylisticScorer } from './stylistic-scorer.js';

import type { TextDocument } from '../detectors/text-document.js';
import type { Logger } from '../logging/logger.js';
import type { PatternRegistry } from '../patterns/pattern-registry.js';
import type { AnalysisResult, PatternResult, ScanIdentity, StylisticScore } from '../types/results.js';

export interface AnalyzerOptions {
  scorer?: StylisticScorer | undefined;
  logger?: Logger | undefined;
}

export interface DetectionOutcome {
  results: PatternResult[];
  warnings: string[];
}

export interface AnalyzeInput {
  identity: ScanIdentity;
  text: string;
  title?: string | undefined;
  publishedDate?: string | undefined;
  /** Defaults to now */
  scannedAt?: string | undefined;
}

export class Analyzer {
  readonly registry: PatternRegistry;
  readonly scorer: StylisticScorer;
  private readonly detectors: DetectorSet;
  private readonly logger: Logger;

  constructor(registry: PatternRegistry, options: AnalyzerOptions = {}) {
    this.registry = registry;
    this.scorer = options.scorer ?? new StylisticScorer();
    this.logger = options.logger ?? silentLogger;
    this.detectors = DetectorSet.fromRegistry(registry);
  }

  /**
   * Evaluate every enabled pattern against a document
   */
  detect(document: TextDocument): DetectionOutcome {
    const results: PatternResult[] = [];
    const warnings: string[] = [];

    for (const detector of this.detectors.all()) {
      const pattern = detector.pattern;
      const base = {
        patternId: pattern.id,
        category: pattern.category,
        patternVersion: pattern.version,
        weight: pattern.weight,
      };

      try {
        const { raw, detail } = detector.compute(document);
        results.push({ ...base, rawValue: raw, normalizedScore: normalizeScore(raw, pattern.params), detail });
      } catch (error) {
        if (!(error instanceof DetectionError)) {
          throw error;
        }
        this.logger.warn(error.message);
        warnings.push(error.message);
        results.push({ ...base, rawValue: 0, normalizedScore: 0, detail: 'detection failed', error: error.message });
      }
    }

    return { results, warnings };
  }

  score(results: readonly PatternResult[]): StylisticScore {
    return this.scorer.score(results);
  }

  /**
   * Detect and score in one call
   */
  analyze(input: AnalyzeInput): AnalysisResult {
    const document = createTextDocument(input.text);
    const { results, warnings } = this.detect(document);
    return {
      identity: input.identity,
      wordCount: document.wordCount,
      title: input.title,
      publishedDate: input.publishedDate,
      patternResults: results,
      warnings,
      scannedAt: input.scannedAt ?? new Date().toISOString(),
      ...this.score(results),
    };
  }
}
