/**
 * lexiscan-core
 *
 * Stylistic-anomaly scoring: a versioned pattern registry, detectors,
 * score aggregation, SQLite persistence with staleness tracking and a
 * bounded-concurrency scan pipeline.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './patterns/index.js';
export * from './detectors/index.js';
export * from './scoring/index.js';
export * from './store/index.js';
export * from './extraction/index.js';
export * from './scanner/index.js';
export * from './config/index.js';

export const VERSION = '0.1.0';
