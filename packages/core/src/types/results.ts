/**
 * Scoring and scan result types
 */

import type { PatternCategory } from './patterns.js';

/**
 * Label derived from a stylistic index
 */
export type StylisticLabel = 'LIKELY_HUMAN' | 'UNCERTAIN' | 'LIKELY_AI';

export const STYLISTIC_LABELS = [
  'LIKELY_HUMAN',
  'UNCERTAIN',
  'LIKELY_AI',
] as const satisfies readonly StylisticLabel[];

/**
 * Outcome of evaluating one pattern against one document
 */
export interface PatternResult {
  patternId: string;
  category: PatternCategory;
  /** Pattern version in effect when the result was computed */
  patternVersion: number;
  weight: number;
  /** Raw detector output */
  rawValue: number;
  /** rawValue normalized through the pattern's thresholds, in [0, 1] */
  normalizedScore: number;
  /** Short human-readable explanation of the raw value */
  detail: string;
  /** Set when the detector raised a DetectionError; the score is then 0 */
  error?: string;
}

/** Per-category weighted mean of normalized scores */
export type CategoryScores = Partial<Record<PatternCategory, number>>;

/**
 * Aggregated score for one document
 */
export interface StylisticScore {
  categoryScores: CategoryScores;
  /** Integer in [0, 100] */
  index: number;
  label: StylisticLabel;
}

/**
 * Identity of a scanned target: exactly one of url or file path
 */
export type ScanIdentity =
  | { kind: 'url'; url: string }
  | { kind: 'file'; filePath: string };

/**
 * Full evaluation of one target
 */
export interface AnalysisResult extends StylisticScore {
  identity: ScanIdentity;
  wordCount: number;
  title?: string | undefined;
  publishedDate?: string | undefined;
  patternResults: PatternResult[];
  /** Warnings raised by detectors (DetectionError messages) */
  warnings: string[];
  scannedAt: string;
}
