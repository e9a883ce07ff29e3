/**
 * Stylistic Scorer - category scores, final index and label
 *
 * Category score: weighted mean of the normalized scores of the patterns in
 * that category, Σ(score × weight) / Σ(weight). A category with no results
 * is left out of the index rather than counted as 0.
 *
 * Index: round(100 × weighted mean of category scores). Categories weigh 1
 * unless configured otherwise.
 *
 * Label (defaults):
 * - index < 15: LIKELY_HUMAN
 * - 15 ≤ index < 30: UNCERTAIN
 * - index ≥ 30: LIKELY_AI
 */

import { ConfigError } from '../errors/index.js';
import { PATTERN_CATEGORIES } from '../types/patterns.js';

import { clamp } from './normalize.js';

import type { ConfigIssue } from '../errors/index.js';
import type { PatternCategory } from '../types/patterns.js';
import type { CategoryScores, PatternResult, StylisticLabel, StylisticScore } from '../types/results.js';

/**
 * Index boundaries between labels
 */
export interface LabelThresholds {
  /** Lowest index labelled UNCERTAIN */
  uncertainAt: number;
  /** Lowest index labelled LIKELY_AI */
  likelyAiAt: number;
}

export const DEFAULT_LABEL_THRESHOLDS: Readonly<LabelThresholds> = Object.freeze({
  uncertainAt: 15,
  likelyAiAt: 30,
});

/** Relative weight of each category in the index; missing categories weigh 1 */
export type CategoryWeights = Partial<Record<PatternCategory, number>>;

export interface ScorerOptions {
  categoryWeights?: CategoryWeights | undefined;
  labels?: Partial<LabelThresholds> | undefined;
}

/** Minimal per-pattern input to category scoring */
export type ScoredPattern = Pick<PatternResult, 'patternId' | 'category' | 'weight' | 'normalizedScore'>;

export class StylisticScorer {
  private readonly categoryWeights: CategoryWeights;
  private readonly labels: LabelThresholds;

  constructor(options: ScorerOptions = {}) {
    this.categoryWeights = { ...options.categoryWeights };
    this.labels = { ...DEFAULT_LABEL_THRESHOLDS, ...options.labels };
    this.validate();
  }

  /**
   * Aggregate pattern results into a final score
   */
  score(results: readonly ScoredPattern[]): StylisticScore {
    const categoryScores = this.scoreCategories(results);
    const index = this.computeIndex(categoryScores);
    return { categoryScores, index, label: this.classify(index) };
  }

  /**
   * Weighted mean per category. Results are summed in pattern-id order so the
   * outcome does not depend on the order they arrive in.
   */
  scoreCategories(results: readonly ScoredPattern[]): CategoryScores {
    const sorted = [...results].sort((a, b) => (a.patternId < b.patternId ? -1 : a.patternId > b.patternId ? 1 : 0));
    const scores: CategoryScores = {};

    for (const category of PATTERN_CATEGORIES) {
      const inCategory = sorted.filter((r) => r.category === category);
      if (inCategory.length === 0) {continue;}

      const totalWeight = inCategory.reduce((sum, r) => sum + r.weight, 0);
      scores[category] = totalWeight > 0
        ? inCategory.reduce((sum, r) => sum + r.normalizedScore * r.weight, 0) / totalWeight
        // All weights zero: fall back to the plain mean
        : inCategory.reduce((sum, r) => sum + r.normalizedScore, 0) / inCategory.length;
    }

    return scores;
  }

  /**
   * Integer index in [0, 100] from category scores
   */
  computeIndex(categoryScores: CategoryScores): number {
    let weighted = 0;
    let totalWeight = 0;

    for (const category of PATTERN_CATEGORIES) {
      const score = categoryScores[category];
      if (score === undefined) {continue;}
      const weight = this.categoryWeights[category] ?? 1;
      weighted += score * weight;
      totalWeight += weight;
    }

    if (totalWeight === 0) {return 0;}
    return clamp(Math.round((100 * weighted) / totalWeight), 0, 100);
  }

  classify(index: number): StylisticLabel {
    if (index >= this.labels.likelyAiAt) {
      return 'LIKELY_AI';
    }
    if (index >= this.labels.uncertainAt) {
      return 'UNCERTAIN';
    }
    return 'LIKELY_HUMAN';
  }

  getLabelThresholds(): LabelThresholds {
    return { ...this.labels };
  }

  getCategoryWeights(): CategoryWeights {
    return { ...this.categoryWeights };
  }

  private validate(): void {
    const issues: ConfigIssue[] = [];
    const { uncertainAt, likelyAiAt } = this.labels;

    for (const [key, value] of Object.entries(this.labels)) {
      if (!Number.isFinite(value) || value < 0 || value > 100) {
        issues.push({ path: `labels.${key}`, message: `must be between 0 and 100, got ${value}` });
      }
    }
    if (uncertainAt > likelyAiAt) {
      issues.push({
        path: 'labels.uncertainAt',
        message: `must not exceed labels.likelyAiAt (${uncertainAt} > ${likelyAiAt})`,
      });
    }
    for (const [category, weight] of Object.entries(this.categoryWeights)) {
      if (weight === undefined) {continue;}
      if (!Number.isFinite(weight) || weight < 0) {
        issues.push({ path: `categoryWeights.${category}`, message: `must be a non-negative number, got ${weight}` });
      }
    }

    if (issues.length > 0) {
      throw new ConfigError('Invalid scoring configuration', { issues });
    }
  }
}
