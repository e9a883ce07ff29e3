/**
 * Detector Set - one compiled detector per enabled pattern
 *
 * `createDetector` is the only place detection types are dispatched; adding
 * a kind means extending the DetectionType union and this switch.
 */

import { FrequencyDetector } from './frequency-detector.js';
import { LinguisticDetector } from './linguistic-detector.js';
import { RegexDetector } from './regex-detector.js';
import { StructuralDetector } from './structural-detector.js';

import type { Detector } from './base-detector.js';
import type { PatternRegistry } from '../patterns/pattern-registry.js';
import type { PatternDefinition } from '../types/patterns.js';

export function createDetector(pattern: PatternDefinition): Detector {
  switch (pattern.detectionType) {
    case 'frequency':
      return new FrequencyDetector(pattern);
    case 'regex':
      return new RegexDetector(pattern);
    case 'structural':
      return new StructuralDetector(pattern);
    case 'linguistic':
      return new LinguisticDetector(pattern);
    default: {
      const unreachable: never = pattern;
      throw new Error(`Unsupported detection type in ${JSON.stringify(unreachable)}`);
    }
  }
}

export class DetectorSet {
  private constructor(private readonly detectors: readonly Detector[]) {}

  /**
   * Compile detectors for every enabled pattern, in registry order
   */
  static fromRegistry(registry: PatternRegistry): DetectorSet {
    return new DetectorSet(registry.enabled().map(createDetector));
  }

  all(): readonly Detector[] {
    return this.detectors;
  }

  get size(): number {
    return this.detectors.length;
  }
}
