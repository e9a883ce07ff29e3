/**
 * Configuration types
 */

import type { CategoryWeights, LabelThresholds } from '../scoring/stylistic-scorer.js';

export interface ScanSettings {
  /** Targets processed at once */
  concurrency: number;
  fetchTimeoutMs: number;
  /** Retries of a transient fetch failure */
  maxRetries: number;
  retryBaseDelayMs: number;
  /** Fewer words of extracted text than this fails the target */
  minWords: number;
  userAgent: string;
}

export interface LexiscanConfig {
  /** Directory holding pattern JSON files */
  patternsDir: string;
  /** SQLite database file */
  dbPath: string;
  labels: LabelThresholds;
  categoryWeights: CategoryWeights;
  scan: ScanSettings;
}
