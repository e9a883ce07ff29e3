/**
 * Linguistic Detector - metrics over language use
 *
 * - sentence_burstiness: 1 − CV of sentence word counts, floored at 0
 * - type_token_ratio: mean unique/total ratio over half-overlapping windows
 * - question_rate: 1 − fraction of sentences ending in "?"
 * - avg_sentence_length: mean words per sentence
 */

import { BaseDetector } from './base-detector.js';
import { invertedVariation, mean } from './statistics.js';
import { splitWords } from './text-document.js';

import type { DetectorOutput } from './base-detector.js';
import type { TextDocument } from './text-document.js';
import type { LinguisticPattern } from '../types/patterns.js';

export class LinguisticDetector extends BaseDetector<LinguisticPattern> {
  compute(document: TextDocument): DetectorOutput {
    const { metric } = this.pattern.params;

    switch (metric) {
      case 'sentence_burstiness':
        return this.sentenceBurstiness(document);
      case 'type_token_ratio':
        return this.typeTokenRatio(document);
      case 'question_rate':
        return this.questionRate(document);
      case 'avg_sentence_length':
        return this.averageSentenceLength(document);
      default:
        throw this.unknownMetric(metric);
    }
  }

  private sentenceBurstiness(document: TextDocument): DetectorOutput {
    const { minSentences } = this.pattern.params;
    if (document.sentences.length < minSentences) {
      return this.output(0, `too few sentences (${document.sentences.length} < ${minSentences})`);
    }

    const variation = invertedVariation(document.sentences.map((s) => splitWords(s).length));
    if (!variation) {
      return this.output(0, 'empty sentences');
    }
    return this.output(variation.inverted, `CV=${variation.cv.toFixed(2)} (burstiness=${(1 - variation.inverted).toFixed(2)})`);
  }

  private typeTokenRatio(document: TextDocument): DetectorOutput {
    const { window, invert } = this.pattern.params;
    const tokens = document.tokens;
    if (tokens.length < window) {
      return this.output(0, `too few words for TTR (${tokens.length} < ${window})`);
    }

    const step = Math.max(1, Math.floor(window / 2));
    const ratios: number[] = [];
    for (let start = 0; start + window <= tokens.length; start += step) {
      const chunk = tokens.slice(start, start + window);
      ratios.push(new Set(chunk).size / chunk.length);
    }

    const ttr = mean(ratios);
    const raw = invert ? 1 - ttr : ttr;
    return this.output(raw, `STTR=${ttr.toFixed(3)} over ${ratios.length} windows`);
  }

  private questionRate(document: TextDocument): DetectorOutput {
    const total = document.sentences.length;
    if (total === 0) {
      return this.output(0, 'no sentences');
    }
    const questions = document.sentences.filter((s) => s.endsWith('?')).length;
    const raw = 1 - questions / total;
    return this.output(raw, `${questions}/${total} sentences are questions`);
  }

  private averageSentenceLength(document: TextDocument): DetectorOutput {
    if (document.sentences.length === 0) {
      return this.output(0, 'no sentences');
    }
    const avg = mean(document.sentences.map((s) => splitWords(s).length));
    return this.output(avg, `${avg.toFixed(1)} words/sentence`);
  }
}
