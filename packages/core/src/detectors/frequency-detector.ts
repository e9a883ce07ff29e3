/**
 * Frequency Detector - configured terms per N words
 *
 * `exact` matches whole token sequences; `contains` counts non-overlapping
 * substring occurrences in the lowercased text.
 */

import { BaseDetector } from './base-detector.js';
import { ratePer } from './statistics.js';
import { tokenize } from './text-document.js';

import type { DetectorOutput } from './base-detector.js';
import type { TextDocument } from './text-document.js';
import type { FrequencyPattern } from '../types/patterns.js';

export class FrequencyDetector extends BaseDetector<FrequencyPattern> {
  private readonly lowerTerms: string[];
  private readonly termTokens: string[][];

  constructor(pattern: FrequencyPattern) {
    super(pattern);
    this.lowerTerms = pattern.params.terms.map((t) => t.toLowerCase());
    this.termTokens = pattern.params.terms.map((t) => tokenize(t)).filter((t) => t.length > 0);
  }

  compute(document: TextDocument): DetectorOutput {
    const { perNWords, matchMode } = this.pattern.params;
    const matches = matchMode === 'exact'
      ? this.termTokens.reduce((sum, term) => sum + countTokenSequence(document.tokens, term), 0)
      : this.lowerTerms.reduce((sum, term) => sum + countSubstring(document.lowerText, term), 0);

    const raw = ratePer(matches, document.wordCount, perNWords);
    return this.output(raw, `${raw.toFixed(2)} per ${perNWords} words (${matches} matches)`);
  }
}

/**
 * Non-overlapping occurrences of `needle` in `haystack`
 */
export function countSubstring(haystack: string, needle: string): number {
  if (needle.length === 0) {return 0;}
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Non-overlapping occurrences of a token sequence
 */
export function countTokenSequence(tokens: readonly string[], sequence: readonly string[]): number {
  if (sequence.length === 0) {return 0;}
  let count = 0;
  let i = 0;
  while (i <= tokens.length - sequence.length) {
    if (sequence.every((token, offset) => tokens[i + offset] === token)) {
      count++;
      i += sequence.length;
    } else {
      i++;
    }
  }
  return count;
}
