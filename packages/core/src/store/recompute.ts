/**
 * Recompute a stored scan's index from its stored pattern scores, using the
 * current pattern weights and scorer settings. Patterns that are no longer
 * registered, or are disabled, drop out of the score.
 */

import type { PatternRegistry } from '../patterns/pattern-registry.js';
import type { ScoredPattern, StylisticScorer } from '../scoring/stylistic-scorer.js';
import type { StylisticScore } from '../types/results.js';
import type { ScanStore } from './scan-store.js';

export async function recomputeStoredScore(
  store: ScanStore,
  scanId: number,
  registry: PatternRegistry,
  scorer: StylisticScorer
): Promise<StylisticScore> {
  const stored = await store.listPatternScores(scanId);
  const scored: ScoredPattern[] = [];
  for (const row of stored) {
    const pattern = registry.lookup(row.patternId);
    if (!pattern?.enabled) {continue;}
    scored.push({
      patternId: row.patternId,
      category: pattern.category,
      weight: pattern.weight,
      normalizedScore: row.normalizedScore,
    });
  }

  const score = scorer.score(scored);
  await store.updateScore(scanId, score.index, score.label);
  return score;
}
