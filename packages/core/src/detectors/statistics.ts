/**
 * Small descriptive statistics used by shape metrics
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) {return 0;}
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n − 1 denominator); 0 for fewer than two values
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) {return 0;}
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * 1 − coefficient of variation, floored at 0. Uniform lengths score near 1.
 * Returns undefined when the mean is 0.
 */
export function invertedVariation(values: readonly number[]): { inverted: number; cv: number } | undefined {
  const m = mean(values);
  if (m === 0) {return undefined;}
  const cv = sampleStdDev(values) / m;
  return { inverted: Math.max(0, 1 - cv), cv };
}

/**
 * Occurrences expressed per `perN` words; 0 when there are no words
 */
export function ratePer(count: number, wordCount: number, perN: number): number {
  if (wordCount <= 0) {return 0;}
  return (count * perN) / wordCount;
}
