/**
 * Pattern Schema - validation of pattern definition files
 *
 * Pattern files use snake_case keys; validated data is mapped to the
 * camelCase PatternDefinition used everywhere else.
 */

import { z } from 'zod';

import { tokenize } from '../detectors/text-document.js';
import { errorMessage } from '../errors/index.js';
import { PATTERN_CATEGORIES, PATTERN_SEVERITIES } from '../types/patterns.js';

import type { ConfigIssue } from '../errors/index.js';
import type { PatternDefinition } from '../types/patterns.js';

const thresholdFields = {
  threshold_low: z.number().nonnegative(),
  threshold_high: z.number().nonnegative(),
};

/** Equal thresholds are allowed: normalization becomes a step function */
const thresholdsOrdered = (p: { threshold_low: number; threshold_high: number }): boolean =>
  p.threshold_high >= p.threshold_low;

const thresholdOrderIssue = {
  message: 'threshold_high must be greater than or equal to threshold_low',
  path: ['threshold_high'],
};

const regexSource = z.string().min(1).superRefine((source, ctx) => {
  try {
    new RegExp(source, 'giu');
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid regular expression: ${errorMessage(error)}`,
    });
  }
});

const frequencyParams = z
  .object({
    terms: z.array(z.string().trim().min(1)).min(1),
    match_mode: z.enum(['exact', 'contains']).default('contains'),
    per_n_words: z.number().positive().default(1000),
    ...thresholdFields,
  })
  .refine(thresholdsOrdered, thresholdOrderIssue)
  .superRefine((params, ctx) => {
    if (params.match_mode !== 'exact') {return;}
    // Exact matching compares word tokens, so a term needs at least one
    params.terms.forEach((term, i) => {
      if (tokenize(term).length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `term '${term}' has no words to match in exact mode`,
          path: ['terms', i],
        });
      }
    });
  });

const regexParams = z
  .object({
    patterns: z.array(regexSource).min(1),
    per_n_words: z.number().positive().default(1000),
    ...thresholdFields,
  })
  .refine(thresholdsOrdered, thresholdOrderIssue);

const structuralParams = z
  .object({
    metric: z.string().min(1),
    per_n_words: z.number().positive().default(1000),
    min_paragraphs: z.number().int().min(2).default(3),
    ...thresholdFields,
  })
  .refine(thresholdsOrdered, thresholdOrderIssue);

const linguisticParams = z
  .object({
    metric: z.string().min(1),
    window: z.number().int().min(2).default(50),
    min_sentences: z.number().int().min(2).default(4),
    invert: z.boolean().default(false),
    ...thresholdFields,
  })
  .refine(thresholdsOrdered, thresholdOrderIssue);

const baseFields = {
  id: z.string().regex(/^[a-z0-9][a-z0-9_.-]*$/, 'id must be lowercase letters, digits, "_", "-" or "."'),
  name: z.string().min(1),
  version: z.number().int().min(1).default(1),
  description: z.string().default(''),
  category: z.enum(PATTERN_CATEGORIES),
  weight: z.number().min(0).max(1),
  severity: z.enum(PATTERN_SEVERITIES).default('medium'),
  references: z.array(z.string()).default([]),
  added_by: z.string().default(''),
  enabled: z.boolean().default(true),
};

/**
 * Schema for one pattern file
 */
export const patternFileSchema = z.discriminatedUnion('detection_type', [
  z.object({ ...baseFields, detection_type: z.literal('frequency'), params: frequencyParams }),
  z.object({ ...baseFields, detection_type: z.literal('regex'), params: regexParams }),
  z.object({ ...baseFields, detection_type: z.literal('structural'), params: structuralParams }),
  z.object({ ...baseFields, detection_type: z.literal('linguistic'), params: linguisticParams }),
]);

export type PatternFile = z.infer<typeof patternFileSchema>;

export type PatternParseResult =
  | { success: true; pattern: PatternDefinition }
  | { success: false; issues: ConfigIssue[] };

/**
 * Validate raw pattern data and map it to a PatternDefinition
 */
export function parsePattern(data: unknown, source: string): PatternParseResult {
  const parsed = patternFileSchema.safeParse(data);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }
  return { success: true, pattern: toDefinition(parsed.data, source) };
}

function toDefinition(file: PatternFile, source: string): PatternDefinition {
  const base = {
    id: file.id,
    name: file.name,
    version: file.version,
    description: file.description.trim(),
    category: file.category,
    weight: file.weight,
    severity: file.severity,
    references: Object.freeze([...file.references]),
    addedBy: file.added_by,
    enabled: file.enabled,
    source,
  };

  switch (file.detection_type) {
    case 'frequency':
      return {
        ...base,
        detectionType: 'frequency',
        params: {
          terms: Object.freeze([...file.params.terms]),
          matchMode: file.params.match_mode,
          perNWords: file.params.per_n_words,
          thresholdLow: file.params.threshold_low,
          thresholdHigh: file.params.threshold_high,
        },
      };
    case 'regex':
      return {
        ...base,
        detectionType: 'regex',
        params: {
          patterns: Object.freeze([...file.params.patterns]),
          perNWords: file.params.per_n_words,
          thresholdLow: file.params.threshold_low,
          thresholdHigh: file.params.threshold_high,
        },
      };
    case 'structural':
      return {
        ...base,
        detectionType: 'structural',
        params: {
          metric: file.params.metric,
          perNWords: file.params.per_n_words,
          minParagraphs: file.params.min_paragraphs,
          thresholdLow: file.params.threshold_low,
          thresholdHigh: file.params.threshold_high,
        },
      };
    case 'linguistic':
      return {
        ...base,
        detectionType: 'linguistic',
        params: {
          metric: file.params.metric,
          window: file.params.window,
          minSentences: file.params.min_sentences,
          invert: file.params.invert,
          thresholdLow: file.params.threshold_low,
          thresholdHigh: file.params.threshold_high,
        },
      };
  }
}
