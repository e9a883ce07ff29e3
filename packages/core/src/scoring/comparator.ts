/**
 * Comparator - ranking and side-by-side differences between results
 */

import { identityKey } from '../types/identity.js';
import { PATTERN_CATEGORIES } from '../types/patterns.js';

import type { PatternCategory } from '../types/patterns.js';
import type { AnalysisResult, StylisticScore } from '../types/results.js';

/**
 * Highest index first; ties ordered by target
 */
export function rankResults<T extends AnalysisResult>(results: readonly T[]): T[] {
  return [...results].sort((a, b) => {
    if (a.index !== b.index) {return b.index - a.index;}
    const ka = identityKey(a.identity);
    const kb = identityKey(b.identity);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}

/**
 * Per-category difference a − b; positive means a scores higher.
 * Categories absent from one side count as 0 on that side.
 */
export function deltaVector(a: StylisticScore, b: StylisticScore): Partial<Record<PatternCategory, number>> {
  const delta: Partial<Record<PatternCategory, number>> = {};
  for (const category of PATTERN_CATEGORIES) {
    const left = a.categoryScores[category];
    const right = b.categoryScores[category];
    if (left === undefined && right === undefined) {continue;}
    delta[category] = Math.round(((left ?? 0) - (right ?? 0)) * 1000) / 1000;
  }
  return delta;
}
