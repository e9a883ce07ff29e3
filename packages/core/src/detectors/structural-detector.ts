/**
 * Structural Detector - metrics over document shape
 *
 * - bullet_density: bulleted lines / non-blank lines
 * - header_ratio: header lines / non-blank lines
 * - paragraph_cv_inverted: 1 − CV of paragraph word counts, floored at 0
 * - emoji_density: emoji per N words
 */

import { BaseDetector } from './base-detector.js';
import { invertedVariation, ratePer } from './statistics.js';
import { splitWords } from './text-document.js';

import type { DetectorOutput } from './base-detector.js';
import type { TextDocument } from './text-document.js';
import type { StructuralPattern } from '../types/patterns.js';

export class StructuralDetector extends BaseDetector<StructuralPattern> {
  compute(document: TextDocument): DetectorOutput {
    const { metric } = this.pattern.params;

    switch (metric) {
      case 'bullet_density':
        return this.lineRatio(document.bulletLines, document.lines.length, 'bullet');
      case 'header_ratio':
        return this.lineRatio(document.headerLines, document.lines.length, 'header');
      case 'paragraph_cv_inverted':
        return this.paragraphUniformity(document);
      case 'emoji_density':
        return this.emojiDensity(document);
      default:
        throw this.unknownMetric(metric);
    }
  }

  private lineRatio(matching: number, total: number, kind: string): DetectorOutput {
    if (total === 0) {
      return this.output(0, `no ${kind} lines (empty document)`);
    }
    const ratio = matching / total;
    return this.output(ratio, `${matching}/${total} lines are ${kind}s (${(ratio * 100).toFixed(1)}%)`);
  }

  private paragraphUniformity(document: TextDocument): DetectorOutput {
    const { minParagraphs } = this.pattern.params;
    if (document.paragraphs.length < minParagraphs) {
      return this.output(0, `too few paragraphs (${document.paragraphs.length} < ${minParagraphs})`);
    }

    const variation = invertedVariation(document.paragraphs.map((p) => splitWords(p).length));
    if (!variation) {
      return this.output(0, 'empty paragraphs');
    }
    return this.output(variation.inverted, `CV=${variation.cv.toFixed(2)} (uniformity=${variation.inverted.toFixed(2)})`);
  }

  private emojiDensity(document: TextDocument): DetectorOutput {
    const { perNWords } = this.pattern.params;
    const raw = ratePer(document.emojiCount, document.wordCount, perNWords);
    return this.output(raw, `${document.emojiCount} emoji (${raw.toFixed(2)} per ${perNWords} words)`);
  }
}
