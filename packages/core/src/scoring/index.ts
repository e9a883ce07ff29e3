export { normalizeScore, clamp } from './normalize.js';
export { StylisticScorer, DEFAULT_LABEL_THRESHOLDS } from './stylistic-scorer.js';
export type { LabelThresholds, CategoryWeights, ScorerOptions, ScoredPattern } from './stylistic-scorer.js';
export { Analyzer } from './analyzer.js';
export type { AnalyzerOptions, AnalyzeInput, DetectionOutcome } from './analyzer.js';
export { rankResults, deltaVector } from './comparator.js';
