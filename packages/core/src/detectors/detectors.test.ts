/**
 * Detector Tests
 *
 * Covers text features shared by detectors and the raw value of each
 * detection kind, including the edge cases that resolve to 0.
 */

import { describe, it, expect } from 'vitest';

import { DetectionError } from '../errors/index.js';

import { createDetector } from './detector-set.js';
import { FrequencyDetector, countSubstring, countTokenSequence } from './frequency-detector.js';
import { LinguisticDetector } from './linguistic-detector.js';
import { RegexDetector, countMatches } from './regex-detector.js';
import { StructuralDetector } from './structural-detector.js';
import { createTextDocument, splitSentences } from './text-document.js';

import type {
  FrequencyParams,
  FrequencyPattern,
  LinguisticParams,
  LinguisticPattern,
  RegexPattern,
  StructuralParams,
  StructuralPattern,
} from '../types/patterns.js';

// =============================================================================
// Test Helpers
// =============================================================================

const base = {
  name: 'Test pattern',
  version: 1,
  description: '',
  category: 'punctuation',
  weight: 1,
  severity: 'medium',
  references: [],
  addedBy: '',
  enabled: true,
  source: 'test',
} as const;

function frequency(params: Partial<FrequencyParams>): FrequencyPattern {
  return {
    ...base,
    id: 'freq',
    detectionType: 'frequency',
    params: { terms: [], matchMode: 'contains', perNWords: 1000, thresholdLow: 0, thresholdHigh: 1, ...params },
  };
}

function regex(patterns: string[], perNWords: number): RegexPattern {
  return {
    ...base,
    id: 'regex',
    detectionType: 'regex',
    params: { patterns, perNWords, thresholdLow: 0, thresholdHigh: 1 },
  };
}

function structural(params: Partial<StructuralParams>): StructuralPattern {
  return {
    ...base,
    id: 'structural',
    detectionType: 'structural',
    params: { metric: 'bullet_density', perNWords: 1000, minParagraphs: 3, thresholdLow: 0, thresholdHigh: 1, ...params },
  };
}

function linguistic(params: Partial<LinguisticParams>): LinguisticPattern {
  return {
    ...base,
    id: 'linguistic',
    detectionType: 'linguistic',
    params: {
      metric: 'question_rate',
      window: 50,
      minSentences: 4,
      invert: false,
      thresholdLow: 0,
      thresholdHigh: 1,
      ...params,
    },
  };
}

const MIXED = '# Title\n\nFirst sentence here. Second one follows!\n\n- item one\n- item two\n\nIs this a question? Yes it is.';

// =============================================================================
// Text Document
// =============================================================================

describe('createTextDocument', () => {
  const doc = createTextDocument(MIXED);

  it('counts words, lines, headers and bullets', () => {
    expect(doc.wordCount).toBe(21);
    expect(doc.lines).toHaveLength(5);
    expect(doc.headerLines).toBe(1);
    expect(doc.bulletLines).toBe(2);
    expect(doc.paragraphs).toHaveLength(4);
  });

  it('drops punctuation-only tokens', () => {
    expect(doc.tokens).toHaveLength(18);
    expect(doc.tokens[0]).toBe('title');
  });

  it('ends sentences at paragraph breaks and terminal punctuation', () => {
    expect(doc.sentences).toEqual([
      '# Title',
      'First sentence here.',
      'Second one follows!',
      '- item one - item two',
      'Is this a question?',
      'Yes it is.',
    ]);
  });

  it('handles empty text', () => {
    const empty = createTextDocument('');
    expect(empty.wordCount).toBe(0);
    expect(empty.sentences).toEqual([]);
    expect(empty.paragraphs).toEqual([]);
  });

  it('does not split before a lowercase word', () => {
    expect(splitSentences('See e.g. the appendix. Then stop.')).toEqual(['See e.g. the appendix.', 'Then stop.']);
  });
});

// =============================================================================
// Frequency
// =============================================================================

describe('FrequencyDetector', () => {
  const doc = createTextDocument('Let us delve deeper. Delves are fun.');

  it('matches whole tokens in exact mode', () => {
    const out = new FrequencyDetector(frequency({ terms: ['delve'], matchMode: 'exact', perNWords: 7 })).compute(doc);
    expect(out.raw).toBe(1);
    expect(out.detail).toBe('1.00 per 7 words (1 matches)');
  });

  it('matches substrings in contains mode', () => {
    const out = new FrequencyDetector(frequency({ terms: ['delve'], matchMode: 'contains', perNWords: 7 })).compute(doc);
    expect(out.raw).toBe(2);
  });

  it('matches multi-word terms case-insensitively', () => {
    const text = createTextDocument("In Today's fast-paced world, in today's market.");
    const out = new FrequencyDetector(frequency({ terms: ["in today's"], matchMode: 'exact', perNWords: 7 })).compute(text);
    expect(out.raw).toBe(2);
  });

  it('returns 0 for an empty document', () => {
    const out = new FrequencyDetector(frequency({ terms: ['delve'] })).compute(createTextDocument(''));
    expect(out.raw).toBe(0);
  });

  it('counts non-overlapping occurrences', () => {
    expect(countSubstring('aaaa', 'aa')).toBe(2);
    expect(countSubstring('abc', '')).toBe(0);
    expect(countTokenSequence(['a', 'b', 'a', 'b', 'a'], ['a', 'b'])).toBe(2);
    expect(countTokenSequence(['a'], ['a', 'b'])).toBe(0);
  });
});

// =============================================================================
// Regex
// =============================================================================

describe('RegexDetector', () => {
  it('counts matches per N words', () => {
    const out = new RegexDetector(regex(['—'], 100)).compute(createTextDocument('One — two — three.'));
    expect(out.raw).toBe(40);
    expect(out.detail).toBe('40.00 per 100 words (2 matches)');
  });

  it('sums matches across expressions', () => {
    const out = new RegexDetector(regex(['—', ';'], 7)).compute(createTextDocument('a — b; c — d; e'));
    expect(out.raw).toBe(4);
  });

  it('ignores empty matches', () => {
    expect(countMatches('abc', /x*/g)).toBe(0);
  });
});

// =============================================================================
// Structural
// =============================================================================

describe('StructuralDetector', () => {
  const doc = createTextDocument(MIXED);

  it('computes bullet density over non-blank lines', () => {
    const out = new StructuralDetector(structural({ metric: 'bullet_density' })).compute(doc);
    expect(out.raw).toBe(0.4);
    expect(out.detail).toBe('2/5 lines are bullets (40.0%)');
  });

  it('computes header ratio', () => {
    expect(new StructuralDetector(structural({ metric: 'header_ratio' })).compute(doc).raw).toBe(0.2);
  });

  it('scores uniform paragraphs as 1', () => {
    const uniform = createTextDocument('a b c\n\nd e f\n\ng h i');
    expect(new StructuralDetector(structural({ metric: 'paragraph_cv_inverted' })).compute(uniform).raw).toBe(1);
  });

  it('returns 0 when there are too few paragraphs', () => {
    const out = new StructuralDetector(structural({ metric: 'paragraph_cv_inverted' })).compute(
      createTextDocument('a b c\n\nd e f')
    );
    expect(out.raw).toBe(0);
    expect(out.detail).toBe('too few paragraphs (2 < 3)');
  });

  it('computes emoji density', () => {
    const out = new StructuralDetector(structural({ metric: 'emoji_density', perNWords: 100 })).compute(
      createTextDocument('great 🚀 launch 🎉')
    );
    expect(out.raw).toBe(50);
  });

  it('returns 0 for line ratios of an empty document', () => {
    expect(new StructuralDetector(structural({ metric: 'header_ratio' })).compute(createTextDocument('')).raw).toBe(0);
  });

  it('raises DetectionError for an unknown metric', () => {
    const detector = new StructuralDetector(structural({ metric: 'bogus' }));
    expect(() => detector.compute(doc)).toThrow(DetectionError);
  });
});

// =============================================================================
// Linguistic
// =============================================================================

describe('LinguisticDetector', () => {
  const varied = createTextDocument('A. B c d. E. F g h.');

  it('computes 1 minus the question fraction', () => {
    const out = new LinguisticDetector(linguistic({ metric: 'question_rate' })).compute(createTextDocument(MIXED));
    expect(out.raw).toBeCloseTo(5 / 6, 10);
    expect(out.detail).toBe('1/6 sentences are questions');
  });

  it('scores equal-length sentences as fully uniform', () => {
    const doc = createTextDocument('One two three. Four five six. Seven eight nine. Ten eleven twelve.');
    expect(new LinguisticDetector(linguistic({ metric: 'sentence_burstiness' })).compute(doc).raw).toBe(1);
  });

  it('lowers uniformity for varied sentence lengths', () => {
    const out = new LinguisticDetector(linguistic({ metric: 'sentence_burstiness' })).compute(varied);
    expect(out.raw).toBeCloseTo(1 - Math.sqrt(4 / 3) / 2, 10);
  });

  it('returns 0 with fewer sentences than required', () => {
    const doc = createTextDocument('One two. Three four. Five six.');
    expect(new LinguisticDetector(linguistic({ metric: 'sentence_burstiness' })).compute(doc).raw).toBe(0);
  });

  it('averages type-token ratio over half-overlapping windows', () => {
    const doc = createTextDocument('a a b b');
    expect(new LinguisticDetector(linguistic({ metric: 'type_token_ratio', window: 2 })).compute(doc).raw).toBeCloseTo(
      2 / 3,
      10
    );
    expect(
      new LinguisticDetector(linguistic({ metric: 'type_token_ratio', window: 2, invert: true })).compute(doc).raw
    ).toBeCloseTo(1 / 3, 10);
  });

  it('returns 0 type-token ratio below one window', () => {
    const out = new LinguisticDetector(linguistic({ metric: 'type_token_ratio', window: 50 })).compute(varied);
    expect(out.raw).toBe(0);
  });

  it('computes average sentence length', () => {
    const out = new LinguisticDetector(linguistic({ metric: 'avg_sentence_length' })).compute(varied);
    expect(out.raw).toBe(2);
    expect(out.detail).toBe('2.0 words/sentence');
  });
});

describe('createDetector', () => {
  it('dispatches on detection type', () => {
    expect(createDetector(frequency({ terms: ['x'] }))).toBeInstanceOf(FrequencyDetector);
    expect(createDetector(regex(['x'], 10))).toBeInstanceOf(RegexDetector);
    expect(createDetector(structural({}))).toBeInstanceOf(StructuralDetector);
    expect(createDetector(linguistic({}))).toBeInstanceOf(LinguisticDetector);
  });
});
