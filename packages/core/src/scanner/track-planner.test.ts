import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { SQLiteScanStore } from '../store/sqlite/sqlite-scan-store.js';

import { planTrackTargets } from './track-planner.js';

import type { AnalysisResult } from '../types/results.js';

function saved(url: string, version: number): AnalysisResult {
  return {
    identity: { kind: 'url', url },
    wordCount: 300,
    patternResults: [
      {
        patternId: 'em_dash',
        category: 'punctuation',
        patternVersion: version,
        weight: 1,
        rawValue: 1,
        normalizedScore: 0.1,
        detail: '',
      },
    ],
    warnings: [],
    scannedAt: '2026-02-01T00:00:00.000Z',
    categoryScores: { punctuation: 0.1 },
    index: 10,
    label: 'LIKELY_HUMAN',
  };
}

describe('planTrackTargets', () => {
  let store: SQLiteScanStore;
  const discovered = [
    'https://blog.test/a',
    'https://blog.test/b',
    'https://blog.test/tag/news',
    'https://blog.test/a',
    'https://blog.test/c',
  ];

  beforeEach(async () => {
    store = new SQLiteScanStore({ dbPath: ':memory:' });
    await store.initialize();
    await store.saveResult(saved('https://blog.test/b', 1));
    await store.saveResult(saved('https://blog.test/old', 1));
  });

  afterEach(async () => {
    await store.close();
  });

  it('drops duplicates, exclusions and stored pages', async () => {
    const plan = await planTrackTargets(discovered, {
      store,
      versions: { em_dash: 1 },
      domain: 'blog.test',
      exclude: ['/tag/'],
    });

    expect(plan).toEqual({
      targets: ['https://blog.test/a', 'https://blog.test/c'],
      discovered: 4,
      excluded: 1,
      alreadyScanned: 1,
      stale: 0,
    });
  });

  it('keeps stored pages when skipExisting is off', async () => {
    const plan = await planTrackTargets(discovered, {
      store,
      versions: { em_dash: 1 },
      domain: 'blog.test',
      skipExisting: false,
    });
    expect(plan.targets).toEqual([
      'https://blog.test/a',
      'https://blog.test/b',
      'https://blog.test/tag/news',
      'https://blog.test/c',
    ]);
  });

  it('puts stale stored pages first when rescanning', async () => {
    const plan = await planTrackTargets(discovered, {
      store,
      versions: { em_dash: 2 },
      domain: 'blog.test',
      exclude: ['/tag/'],
      rescanStale: true,
    });
    expect(plan.targets).toEqual([
      'https://blog.test/b',
      'https://blog.test/old',
      'https://blog.test/a',
      'https://blog.test/c',
    ]);
    expect(plan.stale).toBe(2);
  });

  it('caps the plan at the limit', async () => {
    const plan = await planTrackTargets(discovered, {
      store,
      versions: { em_dash: 1 },
      domain: 'blog.test',
      skipExisting: false,
      limit: 2,
    });
    expect(plan.targets).toEqual(['https://blog.test/a', 'https://blog.test/b']);
  });
});
