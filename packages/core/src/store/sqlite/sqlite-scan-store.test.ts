/**
 * SQLite Scan Store Tests
 *
 * Runs against an in-memory database:
 * - upsert identity and replace semantics
 * - foreign keys and atomic rollback
 * - staleness relative to registry versions
 * - domain statistics, percentile and leaderboard
 * - recomputation from stored pattern scores
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { PersistenceError } from '../../errors/index.js';
import { PatternRegistry } from '../../patterns/pattern-registry.js';
import { StylisticScorer } from '../../scoring/stylistic-scorer.js';
import { recomputeStoredScore } from '../recompute.js';

import { SQLiteScanStore } from './sqlite-scan-store.js';

import type { AnalysisResult, ScanIdentity, StylisticLabel } from '../../types/results.js';
import type { ScanFields } from '../scan-store.js';

// =============================================================================
// Test Helpers
// =============================================================================

interface ScoreRow {
  id: string;
  version?: number;
  score?: number;
}

function analysis(
  url: string,
  options: {
    index?: number;
    label?: StylisticLabel;
    scores?: ScoreRow[];
    title?: string;
    publishedDate?: string;
    scannedAt?: string;
  } = {}
): AnalysisResult {
  return {
    identity: { kind: 'url', url },
    wordCount: 500,
    title: options.title,
    publishedDate: options.publishedDate,
    patternResults: (options.scores ?? [{ id: 'a' }, { id: 'b' }]).map((s) => ({
      patternId: s.id,
      category: 'punctuation',
      patternVersion: s.version ?? 1,
      weight: 1,
      rawValue: 3,
      normalizedScore: s.score ?? 0.5,
      detail: '',
    })),
    warnings: [],
    scannedAt: options.scannedAt ?? '2026-03-01T10:00:00.000Z',
    categoryScores: { punctuation: 0.5 },
    index: options.index ?? 50,
    label: options.label ?? 'LIKELY_AI',
  };
}

function url(value: string): ScanIdentity {
  return { kind: 'url', url: value };
}

describe('SQLiteScanStore', () => {
  let store: SQLiteScanStore;

  beforeEach(async () => {
    store = new SQLiteScanStore({ dbPath: ':memory:' });
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  // ===========================================================================
  // Upsert and replace
  // ===========================================================================

  describe('saveResult', () => {
    it('keeps the same id when a target is saved again', async () => {
      const first = await store.saveResult(analysis('https://example.com/a'));
      const second = await store.saveResult(analysis('https://example.com/a', { index: 10, label: 'LIKELY_HUMAN' }));

      expect(second).toBe(first);
      expect(await store.countScans()).toBe(1);
      expect((await store.getScanById(first))?.stylisticIndex).toBe(10);
    });

    it('replaces pattern scores instead of merging them', async () => {
      const id = await store.saveResult(analysis('https://example.com/a', { scores: [{ id: 'a' }, { id: 'b' }] }));
      await store.saveResult(analysis('https://example.com/a', { scores: [{ id: 'c', version: 2, score: 0.25 }] }));

      expect(await store.listPatternScores(id)).toEqual([
        { scanId: id, patternId: 'c', category: 'punctuation', rawValue: 3, normalizedScore: 0.25, patternVersion: 2 },
      ]);
    });

    it('stores the lowercased host as the domain', async () => {
      await store.saveResult(analysis('https://Example.COM/Post'));
      const scan = await store.getScan(url('https://Example.COM/Post'));
      expect(scan?.domain).toBe('example.com');
      expect(scan?.identity).toEqual(url('https://Example.COM/Post'));
    });

    it('keeps a known published date when a rescan has none', async () => {
      await store.saveResult(analysis('https://example.com/a', { publishedDate: '2025-11-02' }));
      await store.saveResult(analysis('https://example.com/a'));
      expect((await store.getScan(url('https://example.com/a')))?.publishedDate).toBe('2025-11-02');
    });

    it('stores file targets with an empty domain', async () => {
      const result = { ...analysis('unused'), identity: { kind: 'file' as const, filePath: '/tmp/essay.txt' } };
      await store.saveResult(result);
      const scan = await store.getScan({ kind: 'file', filePath: '/tmp/essay.txt' });
      expect(scan?.domain).toBe('');
      expect(await store.isScanned(url('/tmp/essay.txt'))).toBe(false);
      expect(await store.isScanned({ kind: 'file', filePath: '/tmp/essay.txt' })).toBe(true);
    });

    it('leaves the previous state untouched when a write fails', async () => {
      const id = await store.saveResult(analysis('https://example.com/a', { index: 40 }));
      const broken = analysis('https://example.com/a', { index: 90, scores: [{ id: 'x' }, { id: 'x' }] });

      await expect(store.saveResult(broken)).rejects.toBeInstanceOf(PersistenceError);
      expect((await store.getScanById(id))?.stylisticIndex).toBe(40);
      expect((await store.listPatternScores(id)).map((s) => s.patternId)).toEqual(['a', 'b']);
    });

    it('rejects an index outside 0..100', async () => {
      await expect(store.saveResult(analysis('https://example.com/a', { index: 150 }))).rejects.toThrow(
        /^Failed to save result: /
      );
      expect(await store.countScans()).toBe(0);
    });
  });

  describe('upsertScan', () => {
    const fields = {
      domain: 'example.com',
      wordCount: 120,
      stylisticIndex: 30,
      label: 'LIKELY_HUMAN',
      scannedAt: '2026-03-01T10:00:00.000Z',
    } satisfies ScanFields;

    it('inserts a url scan and updates it in place', async () => {
      const id = await store.upsertScan(url('https://example.com/a'), { ...fields, title: 'First draft' });
      const again = await store.upsertScan(url('https://example.com/a'), {
        ...fields,
        stylisticIndex: 80,
        label: 'LIKELY_AI',
        scannedAt: '2026-03-02T10:00:00.000Z',
      });

      expect(again).toBe(id);
      expect(await store.countScans()).toBe(1);
      expect(await store.getScanById(id)).toEqual({
        id,
        identity: url('https://example.com/a'),
        domain: 'example.com',
        wordCount: 120,
        stylisticIndex: 80,
        label: 'LIKELY_AI',
        title: 'First draft',
        publishedDate: undefined,
        scannedAt: '2026-03-02T10:00:00.000Z',
      });
    });

    it('inserts a file scan and updates it in place', async () => {
      const file: ScanIdentity = { kind: 'file', filePath: '/tmp/essay.txt' };
      const id = await store.upsertScan(file, { ...fields, domain: '' });
      const again = await store.upsertScan(file, { ...fields, domain: '', wordCount: 140 });

      expect(again).toBe(id);
      expect((await store.getScan(file))?.wordCount).toBe(140);
      expect(await store.isScanned(url('/tmp/essay.txt'))).toBe(false);
    });

    it('keeps url and file identities apart', async () => {
      const a = await store.upsertScan(url('essay.txt'), fields);
      const b = await store.upsertScan({ kind: 'file', filePath: 'essay.txt' }, { ...fields, domain: '' });
      expect(b).not.toBe(a);
      expect(await store.countScans()).toBe(2);
    });
  });

  describe('title', () => {
    it('stores the page title', async () => {
      await store.saveResult(analysis('https://example.com/a', { title: 'On Writing' }));
      expect((await store.getScan(url('https://example.com/a')))?.title).toBe('On Writing');
    });

    it('keeps a known title when a rescan has none', async () => {
      await store.saveResult(analysis('https://example.com/a', { title: 'On Writing' }));
      await store.saveResult(analysis('https://example.com/a'));
      expect((await store.getScan(url('https://example.com/a')))?.title).toBe('On Writing');
    });
  });

  describe('integrity', () => {
    it('refuses pattern scores for a missing scan', async () => {
      await expect(
        store.replacePatternScores(999, [
          { patternId: 'a', category: 'phrases', rawValue: 1, normalizedScore: 1, patternVersion: 1 },
        ])
      ).rejects.toBeInstanceOf(PersistenceError);
    });

    it('deletes pattern scores with their scan', async () => {
      const id = await store.saveResult(analysis('https://example.com/a'));
      expect(await store.deleteScan(url('https://example.com/a'))).toBe(true);
      expect(await store.listPatternScores(id)).toEqual([]);
      expect(await store.deleteScan(url('https://example.com/a'))).toBe(false);
    });

    it('rejects score updates for unknown scans', async () => {
      await expect(store.updateScore(42, 10, 'LIKELY_HUMAN')).rejects.toThrow('No scan with id 42');
    });

    it('rejects calls before initialize', async () => {
      const fresh = new SQLiteScanStore({ dbPath: ':memory:' });
      await expect(fresh.countScans()).rejects.toThrow('Scan store is not initialized');
    });
  });

  // ===========================================================================
  // Staleness
  // ===========================================================================

  describe('staleScans', () => {
    beforeEach(async () => {
      await store.saveResult(analysis('https://example.com/a'));
      await store.saveResult(analysis('https://other.org/b', { scores: [{ id: 'a', version: 2 }, { id: 'b' }] }));
    });

    it('reports nothing when every scan is current', async () => {
      expect(await store.staleScans({ a: 1, b: 1 })).toEqual([]);
    });

    it('reports scans computed with an older version', async () => {
      expect(await store.staleScans({ a: 2, b: 1 })).toEqual([url('https://example.com/a')]);
    });

    it('reports scans missing a current pattern', async () => {
      expect(await store.staleScans({ a: 1, b: 1, c: 1 })).toEqual([
        url('https://example.com/a'),
        url('https://other.org/b'),
      ]);
    });

    it('restricts to one domain', async () => {
      expect(await store.staleScans({ a: 1, b: 1, c: 1 }, { domain: 'other.org' })).toEqual([
        url('https://other.org/b'),
      ]);
    });

    it('clears once the scan is saved at the new version', async () => {
      await store.saveResult(analysis('https://example.com/a', { scores: [{ id: 'a', version: 2 }, { id: 'b' }] }));
      expect(await store.staleScans({ a: 2, b: 1 })).toEqual([]);
    });

    it('summarises stored versions per pattern', async () => {
      expect(await store.patternVersionSummary()).toEqual([
        { patternId: 'a', patternVersion: 1, scans: 1 },
        { patternId: 'a', patternVersion: 2, scans: 1 },
        { patternId: 'b', patternVersion: 1, scans: 2 },
      ]);
    });
  });

  // ===========================================================================
  // Reporting
  // ===========================================================================

  describe('reporting', () => {
    beforeEach(async () => {
      await store.saveResult(
        analysis('https://example.com/1', { index: 10, label: 'LIKELY_HUMAN', scannedAt: '2026-03-01T10:00:00.000Z' })
      );
      await store.saveResult(
        analysis('https://example.com/2', { index: 20, label: 'UNCERTAIN', scannedAt: '2026-03-03T10:00:00.000Z' })
      );
      await store.saveResult(
        analysis('https://example.com/3', { index: 45, label: 'LIKELY_AI', scannedAt: '2026-03-02T10:00:00.000Z' })
      );
      await store.saveResult(analysis('https://other.org/4', { index: 45, label: 'LIKELY_AI' }));
    });

    it('summarises a domain', async () => {
      expect(await store.domainStats('Example.com')).toEqual({
        domain: 'example.com',
        scans: 3,
        meanIndex: 25,
        minIndex: 10,
        maxIndex: 45,
        latestScannedAt: '2026-03-03T10:00:00.000Z',
        labels: { LIKELY_HUMAN: 1, UNCERTAIN: 1, LIKELY_AI: 1 },
      });
    });

    it('returns null for a domain without scans', async () => {
      expect(await store.domainStats('nowhere.net')).toBeNull();
    });

    it('computes the share of stored scans below an index', async () => {
      expect(await store.corpusPercentile(30)).toBe(50);
      expect(await store.corpusPercentile(10)).toBe(0);
      expect(await store.corpusPercentile(100)).toBe(100);
    });

    it('orders the leaderboard by index, then insertion', async () => {
      const top = await store.leaderboard({ limit: 3 });
      expect(top.map((s) => s.identity)).toEqual([
        url('https://example.com/3'),
        url('https://other.org/4'),
        url('https://example.com/2'),
      ]);
    });

    it('filters the leaderboard by label', async () => {
      const human = await store.leaderboard({ label: 'LIKELY_HUMAN' });
      expect(human.map((s) => s.stylisticIndex)).toEqual([10]);
    });
  });

  it('reports 0 percentile for an empty store', async () => {
    expect(await store.corpusPercentile(50)).toBe(0);
  });

  // ===========================================================================
  // Recompute
  // ===========================================================================

  describe('recomputeStoredScore', () => {
    it('rescores stored pattern scores with current registry weights', async () => {
      const registry = PatternRegistry.load([
        {
          source: 'a.json',
          data: {
            id: 'a',
            name: 'A',
            category: 'phrases',
            weight: 1,
            detection_type: 'regex',
            params: { patterns: ['x'], threshold_low: 0, threshold_high: 1 },
          },
        },
        {
          source: 'b.json',
          data: {
            id: 'b',
            name: 'B',
            category: 'phrases',
            weight: 1,
            enabled: false,
            detection_type: 'regex',
            params: { patterns: ['y'], threshold_low: 0, threshold_high: 1 },
          },
        },
      ]);
      const id = await store.saveResult(
        analysis('https://example.com/a', { index: 75, scores: [{ id: 'a', score: 0.2 }, { id: 'b', score: 1 }, { id: 'gone', score: 1 }] })
      );

      const score = await recomputeStoredScore(store, id, registry, new StylisticScorer());

      expect(score).toEqual({ categoryScores: { phrases: 0.2 }, index: 20, label: 'UNCERTAIN' });
      const scan = await store.getScanById(id);
      expect(scan?.stylisticIndex).toBe(20);
      expect(scan?.label).toBe('UNCERTAIN');
    });
  });
});

describe('schema migration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexiscan-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('adds the title column to a version 1 database', async () => {
    const dbPath = path.join(dir, 'scans.db');
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE scans (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        url TEXT UNIQUE,
        file_path TEXT UNIQUE,
        domain TEXT NOT NULL DEFAULT '',
        word_count INTEGER NOT NULL DEFAULT 0,
        stylistic_index INTEGER NOT NULL,
        label TEXT NOT NULL,
        published_date TEXT,
        scanned_at TEXT NOT NULL
      );
      CREATE TABLE pattern_scores (
        scan_id INTEGER NOT NULL REFERENCES scans(id) ON DELETE CASCADE,
        pattern_id TEXT NOT NULL,
        category TEXT NOT NULL,
        raw_value REAL NOT NULL,
        normalized_score REAL NOT NULL,
        pattern_version INTEGER NOT NULL,
        PRIMARY KEY (scan_id, pattern_id)
      );
      INSERT INTO scans (url, domain, stylistic_index, label, scanned_at)
        VALUES ('https://example.com/old', 'example.com', 12, 'LIKELY_HUMAN', '2025-01-01T00:00:00.000Z');
    `);
    legacy.pragma('user_version = 1');
    legacy.close();

    const store = new SQLiteScanStore({ dbPath });
    await store.initialize();
    const old = await store.getScan(url('https://example.com/old'));
    await store.saveResult(analysis('https://example.com/new', { title: 'Fresh' }));
    const fresh = await store.getScan(url('https://example.com/new'));
    await store.close();

    expect(old?.stylisticIndex).toBe(12);
    expect(old?.title).toBeUndefined();
    expect(fresh?.title).toBe('Fresh');
  });

  it('refuses a database from a newer release', async () => {
    const dbPath = path.join(dir, 'future.db');
    const future = new Database(dbPath);
    future.pragma('user_version = 99');
    future.close();

    const store = new SQLiteScanStore({ dbPath });
    await expect(store.initialize()).rejects.toThrow('Database schema version 99 is newer than supported version 2');
  });
});
