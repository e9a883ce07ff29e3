/**
 * Threshold normalization of raw detector output into [0, 1]
 */

import type { Thresholds } from '../types/patterns.js';

/**
 * - raw ≤ low → 0, raw ≥ high → 1, linear in between
 * - low === high → step function: 0 below, 1 at or above
 */
export function normalizeScore(raw: number, thresholds: Thresholds): number {
  const { thresholdLow: low, thresholdHigh: high } = thresholds;
  if (!Number.isFinite(raw)) {return 0;}

  if (high === low) {
    return raw >= low ? 1 : 0;
  }
  if (raw <= low) {return 0;}
  if (raw >= high) {return 1;}

  return clamp((raw - low) / (high - low), 0, 1);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
