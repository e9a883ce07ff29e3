/**
 * Command helper tests: sorting, table rows and exit codes
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { Analyzer, DEFAULT_CONFIG, PatternRegistry, StylisticScorer, silentLogger } from 'lexiscan-core';

import { analyzeTarget } from '../src/commands/analyze.js';

import { comparisonRows, parseSort, sortResults } from '../src/commands/compare.js';
import { parseCategory, patternRows, versionRows } from '../src/commands/patterns.js';
import { selectUrls } from '../src/commands/discover.js';
import { batchExitCode } from '../src/commands/scan.js';
import { parseSource } from '../src/commands/track.js';
import { Spinner } from '../src/ui/spinner.js';

import type { CliContext } from '../src/context.js';
import type { AnalysisResult, BatchSummary, Extractor } from 'lexiscan-core';

function result(url: string, index: number, categoryScores: AnalysisResult['categoryScores']): AnalysisResult {
  return {
    identity: { kind: 'url', url },
    wordCount: 500,
    categoryScores,
    index,
    label: index >= 30 ? 'LIKELY_AI' : index >= 15 ? 'UNCERTAIN' : 'LIKELY_HUMAN',
    patternResults: [],
    warnings: [],
    scannedAt: '2026-01-01T00:00:00.000Z',
  };
}

const A = result('https://a.test/1', 12, { phrases: 0.1 });
const B = result('https://b.test/1', 40, { punctuation: 0.5, phrases: 0.25 });
const C = result('https://c.test/1', 40, { structure: 1 });

describe('compare', () => {
  it('parses the sort order', () => {
    expect(parseSort('target')).toBe('target');
    expect(() => parseSort('date')).toThrow(InvalidArgumentError);
  });

  it('sorts by index, highest first, ties by target', () => {
    expect(sortResults([A, C, B], 'score').map((r) => r.index)).toEqual([40, 40, 12]);
    expect(sortResults([A, C, B], 'score')[0]).toBe(B);
  });

  it('sorts by target', () => {
    expect(sortResults([C, A, B], 'target')).toEqual([A, B, C]);
  });

  it('builds one row per result with a column per category', () => {
    expect(comparisonRows([B, A])).toEqual([
      { '#': 1, target: 'https://b.test/1', index: 40, label: 'LIKELY AI', phrases: 0.25, punctuation: 0.5 },
      { '#': 2, target: 'https://a.test/1', index: 12, label: 'LIKELY HUMAN', phrases: 0.1 },
    ]);
  });
});

describe('patterns', () => {
  it('parses categories', () => {
    expect(parseCategory('emoji')).toBe('emoji');
    expect(() => parseCategory('grammar')).toThrow(InvalidArgumentError);
  });

  it('lists patterns with their detection type', () => {
    const registry = PatternRegistry.load([
      {
        source: 'em_dash.json',
        data: {
          id: 'em_dash',
          name: 'Em-dash frequency',
          category: 'punctuation',
          weight: 0.5,
          enabled: false,
          detection_type: 'regex',
          params: { patterns: ['—'], threshold_low: 2, threshold_high: 12 },
        },
      },
    ]);
    expect(patternRows(registry.all())).toEqual([
      { id: 'em_dash', version: 1, category: 'punctuation', type: 'regex', weight: 0.5, enabled: 'no', name: 'Em-dash frequency' },
    ]);
  });

  it('marks stale, current and unloaded patterns', () => {
    const rows = versionRows({ em_dash: 2, hedging: 1, new_pattern: 1 }, [
      { patternId: 'em_dash', patternVersion: 2, scans: 5 },
      { patternId: 'em_dash', patternVersion: 1, scans: 3 },
      { patternId: 'hedging', patternVersion: 1, scans: 4 },
      { patternId: 'retired', patternVersion: 1, scans: 2 },
    ]);
    expect(rows).toEqual([
      { pattern: 'em_dash', registry: 2, stored: 'v1×3 v2×5', status: '3 stale' },
      { pattern: 'hedging', registry: 1, stored: 'v1×4', status: 'current' },
      { pattern: 'new_pattern', registry: 1, stored: '-', status: 'current' },
      { pattern: 'retired', registry: '-', stored: 'v1×2', status: 'not loaded' },
    ]);
  });
});

describe('scan', () => {
  const summary = (succeeded: number, failed: number): BatchSummary => ({
    total: succeeded + failed,
    succeeded,
    failed,
    skipped: 0,
    cancelled: 0,
    durationMs: 0,
  });

  it('fails only when nothing succeeded', () => {
    expect(batchExitCode(summary(0, 2))).toBe(1);
    expect(batchExitCode(summary(1, 5))).toBe(0);
    expect(batchExitCode(summary(0, 0))).toBe(0);
  });
});

describe('track', () => {
  it('accepts the discovery sources', () => {
    expect(['auto', 'sitemap', 'rss'].map(parseSource)).toEqual(['auto', 'sitemap', 'rss']);
    expect(() => parseSource('atom')).toThrow(InvalidArgumentError);
  });
});

describe('discover', () => {
  const urls = ['https://blog.test/a', 'https://blog.test/tag/x', 'https://blog.test/b', 'https://blog.test/c'];

  it('keeps every URL with no limit', () => {
    expect(selectUrls(urls, { exclude: [], limit: 0 })).toEqual(urls);
  });

  it('applies exclusions before the limit', () => {
    expect(selectUrls(urls, { exclude: ['/tag/'], limit: 2 })).toEqual(['https://blog.test/a', 'https://blog.test/b']);
  });
});

describe('analyze', () => {
  const registry = PatternRegistry.load([]);
  const scorer = new StylisticScorer();
  const extractor: Extractor = {
    extract: async () => ({ text: 'some plain words to score', wordCount: 5 }),
  };
  const ctx: CliContext = {
    config: DEFAULT_CONFIG,
    registry,
    scorer,
    analyzer: new Analyzer(registry, { scorer }),
    extractor,
    logger: silentLogger,
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the scored result', async () => {
    const result = await analyzeTarget(ctx, 'https://blog.test/a', { quiet: true });
    expect(result.identity).toEqual({ kind: 'url', url: 'https://blog.test/a' });
    expect(result.wordCount).toBe(5);
  });

  it('stops the spinner when the run itself rejects', async () => {
    const stop = vi.spyOn(Spinner.prototype, 'stop');

    await expect(analyzeTarget(ctx, 'https://blog.test/a', { save: true, quiet: true })).rejects.toThrow(
      'A store is required to save results or skip existing targets'
    );
    expect(stop).toHaveBeenCalledTimes(1);
  });
});
