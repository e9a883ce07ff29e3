/**
 * Pattern type definitions
 *
 * A pattern is one configured detector: identity, category, detection kind
 * and the thresholds used to normalize its raw signal into [0, 1].
 * Definitions are frozen once loaded; a registry reload builds new objects.
 */

// ============================================================================
// Enumerations
// ============================================================================

/**
 * Stylistic categories a pattern contributes to
 */
export type PatternCategory = 'phrases' | 'punctuation' | 'structure' | 'vocabulary' | 'emoji';

/**
 * Array of all valid pattern categories
 */
export const PATTERN_CATEGORIES = [
  'phrases',
  'punctuation',
  'structure',
  'vocabulary',
  'emoji',
] as const satisfies readonly PatternCategory[];

/**
 * Kinds of raw-signal computation
 */
export type DetectionType = 'frequency' | 'regex' | 'structural' | 'linguistic';

export const DETECTION_TYPES = [
  'frequency',
  'regex',
  'structural',
  'linguistic',
] as const satisfies readonly DetectionType[];

/**
 * Informational severity; never used in scoring
 */
export type PatternSeverity = 'low' | 'medium' | 'high';

export const PATTERN_SEVERITIES = ['low', 'medium', 'high'] as const satisfies readonly PatternSeverity[];

/** Term matching strategy for frequency patterns */
export type MatchMode = 'exact' | 'contains';

// ============================================================================
// Detection Parameters
// ============================================================================

/**
 * Normalization thresholds shared by every detection type.
 * `thresholdHigh === thresholdLow` turns normalization into a step function.
 */
export interface Thresholds {
  thresholdLow: number;
  thresholdHigh: number;
}

export interface FrequencyParams extends Thresholds {
  /** Terms to count (case-insensitive) */
  terms: readonly string[];
  matchMode: MatchMode;
  /** Rate denominator; raw = occurrences × perNWords / wordCount */
  perNWords: number;
}

export interface RegexParams extends Thresholds {
  /** Regular expression sources, matched with the `giu` flags */
  patterns: readonly string[];
  perNWords: number;
}

export interface StructuralParams extends Thresholds {
  /** bullet_density | header_ratio | paragraph_cv_inverted | emoji_density */
  metric: string;
  /** Denominator for emoji_density */
  perNWords: number;
  /** Fewer paragraphs than this yields raw 0 for paragraph_cv_inverted */
  minParagraphs: number;
}

export interface LinguisticParams extends Thresholds {
  /** sentence_burstiness | type_token_ratio | question_rate | avg_sentence_length */
  metric: string;
  /** Window size for type_token_ratio */
  window: number;
  /** Fewer sentences than this yields raw 0 for sentence_burstiness */
  minSentences: number;
  /** Report 1 − TTR instead of TTR */
  invert: boolean;
}

// ============================================================================
// Pattern Definition
// ============================================================================

interface PatternBase {
  /** Stable unique identifier */
  id: string;
  name: string;
  /** Integer ≥ 1, bumped whenever the pattern's behavior changes */
  version: number;
  description: string;
  category: PatternCategory;
  /** Weight within its category, in [0, 1] */
  weight: number;
  severity: PatternSeverity;
  references: readonly string[];
  /** Who added the pattern */
  addedBy: string;
  /** Disabled patterns are listed but never evaluated */
  enabled: boolean;
  /** File the definition was loaded from */
  source: string;
}

export interface FrequencyPattern extends PatternBase {
  detectionType: 'frequency';
  params: FrequencyParams;
}

export interface RegexPattern extends PatternBase {
  detectionType: 'regex';
  params: RegexParams;
}

export interface StructuralPattern extends PatternBase {
  detectionType: 'structural';
  params: StructuralParams;
}

export interface LinguisticPattern extends PatternBase {
  detectionType: 'linguistic';
  params: LinguisticParams;
}

/**
 * A loaded pattern, discriminated by `detectionType`
 */
export type PatternDefinition =
  | FrequencyPattern
  | RegexPattern
  | StructuralPattern
  | LinguisticPattern;

/** Pattern id → version, as used by staleness checks */
export type PatternVersions = Readonly<Record<string, number>>;
