/**
 * Regex Detector - regular expression matches per N words
 */

import { BaseDetector } from './base-detector.js';
import { ratePer } from './statistics.js';

import type { DetectorOutput } from './base-detector.js';
import type { TextDocument } from './text-document.js';
import type { RegexPattern } from '../types/patterns.js';

export class RegexDetector extends BaseDetector<RegexPattern> {
  private readonly expressions: RegExp[];

  constructor(pattern: RegexPattern) {
    super(pattern);
    // Sources are validated when the registry loads
    this.expressions = pattern.params.patterns.map((source) => new RegExp(source, 'giu'));
  }

  compute(document: TextDocument): DetectorOutput {
    const { perNWords } = this.pattern.params;
    let matches = 0;
    for (const expression of this.expressions) {
      matches += countMatches(document.text, expression);
    }

    const raw = ratePer(matches, document.wordCount, perNWords);
    return this.output(raw, `${raw.toFixed(2)} per ${perNWords} words (${matches} matches)`);
  }
}

/**
 * Non-empty matches of a global expression, scanned left to right
 */
export function countMatches(text: string, expression: RegExp): number {
  let count = 0;
  for (const match of text.matchAll(expression)) {
    if (match[0].length > 0) {
      count++;
    }
  }
  return count;
}
