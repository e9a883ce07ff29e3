/**
 * Base Detector - uniform contract for every detection kind
 *
 * A detector maps a document to one raw scalar. Ordinary edge cases (empty
 * text, one sentence, no matches) resolve to a defined value; only malformed
 * pattern configuration raises DetectionError.
 */

import { DetectionError } from '../errors/index.js';

import type { TextDocument } from './text-document.js';
import type { PatternDefinition } from '../types/patterns.js';

/**
 * Raw detector output
 */
export interface DetectorOutput {
  raw: number;
  /** Short explanation, e.g. "7.00 per 1000 words (7 matches)" */
  detail: string;
}

export interface Detector {
  readonly pattern: PatternDefinition;
  compute(document: TextDocument): DetectorOutput;
}

export abstract class BaseDetector<P extends PatternDefinition> implements Detector {
  constructor(public readonly pattern: P) {}

  abstract compute(document: TextDocument): DetectorOutput;

  get id(): string {
    return this.pattern.id;
  }

  protected output(raw: number, detail: string): DetectorOutput {
    return { raw: Number.isFinite(raw) ? raw : 0, detail };
  }

  protected unknownMetric(metric: string): DetectionError {
    return new DetectionError(
      this.pattern.id,
      `Unknown ${this.pattern.detectionType} metric '${metric}' in pattern '${this.pattern.id}'`
    );
  }
}
