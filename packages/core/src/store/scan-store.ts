/**
 * Scan Store Interface
 *
 * Persistence for scan results. Implementations must make the scan row and
 * its pattern scores visible together or not at all.
 */

import type { PatternCategory, PatternVersions } from '../types/patterns.js';
import type { AnalysisResult, ScanIdentity, StylisticLabel } from '../types/results.js';

/**
 * Scan-level fields written on every upsert
 */
export interface ScanFields {
  domain: string;
  wordCount: number;
  stylisticIndex: number;
  label: StylisticLabel;
  /** Kept from the previous row when absent */
  title?: string | undefined;
  /** Kept from the previous row when absent */
  publishedDate?: string | undefined;
  scannedAt: string;
}

/**
 * One pattern score as written to the store
 */
export interface PatternScoreInput {
  patternId: string;
  category: PatternCategory;
  rawValue: number;
  normalizedScore: number;
  patternVersion: number;
}

export interface StoredScan extends ScanFields {
  id: number;
  identity: ScanIdentity;
  title: string | undefined;
  publishedDate: string | undefined;
}

export interface StoredPatternScore extends PatternScoreInput {
  scanId: number;
}

export interface StaleScanQuery {
  /** Restrict to scans of this host */
  domain?: string | undefined;
}

export interface DomainStats {
  domain: string;
  scans: number;
  meanIndex: number;
  minIndex: number;
  maxIndex: number;
  latestScannedAt: string;
  labels: Record<StylisticLabel, number>;
}

export interface PatternVersionCount {
  patternId: string;
  patternVersion: number;
  scans: number;
}

export interface LeaderboardQuery {
  limit?: number | undefined;
  label?: StylisticLabel | undefined;
}

export interface ScanStore {
  initialize(): Promise<void>;
  close(): Promise<void>;

  /**
   * Insert or update the scan row for `identity` and return its id. The id
   * of an existing row never changes.
   */
  upsertScan(identity: ScanIdentity, fields: ScanFields): Promise<number>;

  /**
   * Replace every pattern score of a scan with `scores`, atomically
   */
  replacePatternScores(scanId: number, scores: readonly PatternScoreInput[]): Promise<void>;

  /**
   * Upsert the scan and replace its pattern scores in one transaction
   */
  saveResult(result: AnalysisResult): Promise<number>;

  getScan(identity: ScanIdentity): Promise<StoredScan | null>;
  getScanById(id: number): Promise<StoredScan | null>;
  listPatternScores(scanId: number): Promise<StoredPatternScore[]>;
  isScanned(identity: ScanIdentity): Promise<boolean>;
  deleteScan(identity: ScanIdentity): Promise<boolean>;
  countScans(): Promise<number>;

  /**
   * Identities of scans missing a current pattern or holding an older
   * version of one, in insertion order
   */
  staleScans(versions: PatternVersions, query?: StaleScanQuery): Promise<ScanIdentity[]>;

  updateScore(scanId: number, stylisticIndex: number, label: StylisticLabel): Promise<void>;

  domainStats(domain: string): Promise<DomainStats | null>;
  patternVersionSummary(): Promise<PatternVersionCount[]>;
  /** Share of stored scans (0-100) whose index is below `index` */
  corpusPercentile(index: number): Promise<number>;
  leaderboard(query?: LeaderboardQuery): Promise<StoredScan[]>;
}
