/**
 * SQLite Scan Store
 *
 * better-sqlite3 is synchronous; the async surface matches ScanStore so a
 * different backend can be swapped in. Each public write runs in a single
 * transaction.
 */

import { PersistenceError } from '../../errors/index.js';
import { PATTERN_CATEGORIES } from '../../types/patterns.js';
import { STYLISTIC_LABELS } from '../../types/results.js';
import { domainOf } from '../../types/identity.js';

import { SQLiteClient } from './client.js';
import { QUERIES } from './queries.js';
import { MIGRATIONS, SCHEMA, SCHEMA_VERSION } from './schema.js';

import type { SQLiteClientConfig } from './client.js';
import type { PatternCategory, PatternVersions } from '../../types/patterns.js';
import type { AnalysisResult, ScanIdentity, StylisticLabel } from '../../types/results.js';
import type {
  DomainStats,
  LeaderboardQuery,
  PatternScoreInput,
  PatternVersionCount,
  ScanFields,
  ScanStore,
  StaleScanQuery,
  StoredPatternScore,
  StoredScan,
} from '../scan-store.js';

// ============================================================================
// Row shapes
// ============================================================================

interface IdRow {
  id: number;
}

interface CountRow {
  count: number;
}

interface ScanRow {
  id: number;
  url: string | null;
  file_path: string | null;
  domain: string;
  word_count: number;
  stylistic_index: number;
  label: string;
  title: string | null;
  published_date: string | null;
  scanned_at: string;
}

interface PatternScoreRow {
  scan_id: number;
  pattern_id: string;
  category: string;
  raw_value: number;
  normalized_score: number;
  pattern_version: number;
}

interface StaleRow {
  id: number;
  url: string | null;
  file_path: string | null;
}

interface DomainStatsRow {
  scans: number;
  mean_index: number | null;
  min_index: number | null;
  max_index: number | null;
  latest_scanned_at: string | null;
  likely_human: number | null;
  uncertain: number | null;
  likely_ai: number | null;
}

interface VersionSummaryRow {
  pattern_id: string;
  pattern_version: number;
  scans: number;
}

type ScanBinding = [string, string, number, number, string, string | null, string | null, string];

const DEFAULT_LEADERBOARD_LIMIT = 20;

// ============================================================================
// Store
// ============================================================================

export class SQLiteScanStore implements ScanStore {
  private client: SQLiteClient | null = null;

  constructor(private readonly config: SQLiteClientConfig) {}

  async initialize(): Promise<void> {
    if (this.client) {return;}
    const client = new SQLiteClient(this.config);
    try {
      migrate(client);
    } catch (error) {
      client.close();
      throw error instanceof PersistenceError ? error : new PersistenceError('Schema migration failed', error);
    }
    this.client = client;
  }

  async close(): Promise<void> {
    this.client?.close();
    this.client = null;
  }

  async upsertScan(identity: ScanIdentity, fields: ScanFields): Promise<number> {
    return this.write('upsert scan', (client) => client.transaction(() => this.upsertSync(client, identity, fields)));
  }

  async replacePatternScores(scanId: number, scores: readonly PatternScoreInput[]): Promise<void> {
    this.write('replace pattern scores', (client) =>
      client.transaction(() => this.replaceSync(client, scanId, scores))
    );
  }

  async saveResult(result: AnalysisResult): Promise<number> {
    const fields: ScanFields = {
      domain: domainOf(result.identity),
      wordCount: result.wordCount,
      stylisticIndex: result.index,
      label: result.label,
      title: result.title,
      publishedDate: result.publishedDate,
      scannedAt: result.scannedAt,
    };
    const scores: PatternScoreInput[] = result.patternResults.map((r) => ({
      patternId: r.patternId,
      category: r.category,
      rawValue: r.rawValue,
      normalizedScore: r.normalizedScore,
      patternVersion: r.patternVersion,
    }));

    return this.write('save result', (client) =>
      client.transaction(() => {
        const scanId = this.upsertSync(client, result.identity, fields);
        this.replaceSync(client, scanId, scores);
        return scanId;
      })
    );
  }

  async getScan(identity: ScanIdentity): Promise<StoredScan | null> {
    const db = this.requireClient().database;
    const row =
      identity.kind === 'url'
        ? db.prepare<[string], ScanRow>(QUERIES.scanByUrl).get(identity.url)
        : db.prepare<[string], ScanRow>(QUERIES.scanByFile).get(identity.filePath);
    return row ? rowToScan(row) : null;
  }

  async getScanById(id: number): Promise<StoredScan | null> {
    const row = this.requireClient().database.prepare<[number], ScanRow>(QUERIES.scanById).get(id);
    return row ? rowToScan(row) : null;
  }

  async listPatternScores(scanId: number): Promise<StoredPatternScore[]> {
    const rows = this.requireClient()
      .database.prepare<[number], PatternScoreRow>(QUERIES.patternScoresForScan)
      .all(scanId);
    return rows.map(rowToPatternScore);
  }

  async isScanned(identity: ScanIdentity): Promise<boolean> {
    return this.findScanId(this.requireClient(), identity) !== undefined;
  }

  async deleteScan(identity: ScanIdentity): Promise<boolean> {
    return this.write('delete scan', (client) => {
      const id = this.findScanId(client, identity);
      if (id === undefined) {return false;}
      return client.database.prepare<[number]>(QUERIES.deleteScan).run(id).changes > 0;
    });
  }

  async countScans(): Promise<number> {
    return this.requireClient().database.prepare<[], CountRow>(QUERIES.countScans).get()?.count ?? 0;
  }

  async staleScans(versions: PatternVersions, query: StaleScanQuery = {}): Promise<ScanIdentity[]> {
    const domain = query.domain ?? null;
    const rows = this.requireClient()
      .database.prepare<[string | null, string | null, string], StaleRow>(QUERIES.staleScans)
      .all(domain, domain, JSON.stringify(versions));
    return rows.map(rowToIdentity);
  }

  async updateScore(scanId: number, stylisticIndex: number, label: StylisticLabel): Promise<void> {
    this.write('update score', (client) => {
      const result = client.database
        .prepare<[number, string, number]>(QUERIES.updateScanScore)
        .run(stylisticIndex, label, scanId);
      if (result.changes === 0) {
        throw new PersistenceError(`No scan with id ${scanId}`);
      }
    });
  }

  async domainStats(domain: string): Promise<DomainStats | null> {
    const row = this.requireClient()
      .database.prepare<[string], DomainStatsRow>(QUERIES.domainStats)
      .get(domain.toLowerCase());
    if (!row || row.scans === 0) {return null;}
    return {
      domain: domain.toLowerCase(),
      scans: row.scans,
      meanIndex: Math.round((row.mean_index ?? 0) * 10) / 10,
      minIndex: row.min_index ?? 0,
      maxIndex: row.max_index ?? 0,
      latestScannedAt: row.latest_scanned_at ?? '',
      labels: {
        LIKELY_HUMAN: row.likely_human ?? 0,
        UNCERTAIN: row.uncertain ?? 0,
        LIKELY_AI: row.likely_ai ?? 0,
      },
    };
  }

  async patternVersionSummary(): Promise<PatternVersionCount[]> {
    const rows = this.requireClient()
      .database.prepare<[], VersionSummaryRow>(QUERIES.patternVersionSummary)
      .all();
    return rows.map((r) => ({ patternId: r.pattern_id, patternVersion: r.pattern_version, scans: r.scans }));
  }

  async corpusPercentile(index: number): Promise<number> {
    const db = this.requireClient().database;
    const total = db.prepare<[], CountRow>(QUERIES.countScans).get()?.count ?? 0;
    if (total === 0) {return 0;}
    const below = db.prepare<[number], CountRow>(QUERIES.countBelowIndex).get(index)?.count ?? 0;
    return Math.round((below / total) * 100);
  }

  async leaderboard(query: LeaderboardQuery = {}): Promise<StoredScan[]> {
    const label = query.label ?? null;
    const rows = this.requireClient()
      .database.prepare<[string | null, string | null, number], ScanRow>(QUERIES.leaderboard)
      .all(label, label, query.limit ?? DEFAULT_LEADERBOARD_LIMIT);
    return rows.map(rowToScan);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireClient(): SQLiteClient {
    if (!this.client) {
      throw new PersistenceError('Scan store is not initialized');
    }
    return this.client;
  }

  private write<T>(operation: string, fn: (client: SQLiteClient) => T): T {
    const client = this.requireClient();
    try {
      return fn(client);
    } catch (error) {
      if (error instanceof PersistenceError) {throw error;}
      throw new PersistenceError(`Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  private findScanId(client: SQLiteClient, identity: ScanIdentity): number | undefined {
    const db = client.database;
    const row =
      identity.kind === 'url'
        ? db.prepare<[string], IdRow>(QUERIES.scanIdByUrl).get(identity.url)
        : db.prepare<[string], IdRow>(QUERIES.scanIdByFile).get(identity.filePath);
    return row?.id;
  }

  private upsertSync(client: SQLiteClient, identity: ScanIdentity, fields: ScanFields): number {
    const binding: ScanBinding = [
      identity.kind === 'url' ? identity.url : identity.filePath,
      fields.domain,
      fields.wordCount,
      fields.stylisticIndex,
      fields.label,
      fields.title ?? null,
      fields.publishedDate ?? null,
      fields.scannedAt,
    ];
    const sql = identity.kind === 'url' ? QUERIES.upsertUrlScan : QUERIES.upsertFileScan;
    client.database.prepare<ScanBinding>(sql).run(...binding);

    // lastInsertRowid is not reliable after the UPDATE branch of an upsert
    const id = this.findScanId(client, identity);
    if (id === undefined) {
      throw new PersistenceError('Scan row missing after upsert');
    }
    return id;
  }

  private replaceSync(client: SQLiteClient, scanId: number, scores: readonly PatternScoreInput[]): void {
    const db = client.database;
    db.prepare<[number]>(QUERIES.deletePatternScores).run(scanId);
    const insert = db.prepare<[number, string, string, number, number, number]>(QUERIES.insertPatternScore);
    for (const s of scores) {
      insert.run(scanId, s.patternId, s.category, s.rawValue, s.normalizedScore, s.patternVersion);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function migrate(client: SQLiteClient): void {
  const current = client.database.pragma('user_version', { simple: true });
  const version = typeof current === 'number' ? current : 0;
  if (version > SCHEMA_VERSION) {
    throw new PersistenceError(
      `Database schema version ${version} is newer than supported version ${SCHEMA_VERSION}`
    );
  }
  if (version === 0) {
    client.transaction(() => {
      client.exec(SCHEMA);
      client.database.pragma(`user_version = ${SCHEMA_VERSION}`);
    });
  } else if (version < SCHEMA_VERSION) {
    client.transaction(() => {
      for (let next = version + 1; next <= SCHEMA_VERSION; next++) {
        const sql = MIGRATIONS[next];
        if (sql === undefined) {throw new PersistenceError(`No migration to schema version ${next}`);}
        client.exec(sql);
      }
      client.database.pragma(`user_version = ${SCHEMA_VERSION}`);
    });
  }
}

function rowToIdentity(row: { url: string | null; file_path: string | null }): ScanIdentity {
  if (row.url !== null) {return { kind: 'url', url: row.url };}
  if (row.file_path !== null) {return { kind: 'file', filePath: row.file_path };}
  throw new PersistenceError('Scan row has neither url nor file_path');
}

function toLabel(value: string): StylisticLabel {
  const label = STYLISTIC_LABELS.find((l) => l === value);
  if (!label) {throw new PersistenceError(`Unknown label in store: ${value}`);}
  return label;
}

function toCategory(value: string): PatternCategory {
  const category = PATTERN_CATEGORIES.find((c) => c === value);
  if (!category) {throw new PersistenceError(`Unknown category in store: ${value}`);}
  return category;
}

function rowToScan(row: ScanRow): StoredScan {
  return {
    id: row.id,
    identity: rowToIdentity(row),
    domain: row.domain,
    wordCount: row.word_count,
    stylisticIndex: row.stylistic_index,
    label: toLabel(row.label),
    title: row.title ?? undefined,
    publishedDate: row.published_date ?? undefined,
    scannedAt: row.scanned_at,
  };
}

function rowToPatternScore(row: PatternScoreRow): StoredPatternScore {
  return {
    scanId: row.scan_id,
    patternId: row.pattern_id,
    category: toCategory(row.category),
    rawValue: row.raw_value,
    normalizedScore: row.normalized_score,
    patternVersion: row.pattern_version,
  };
}
