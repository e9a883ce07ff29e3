export * from './patterns.js';
export * from './results.js';
export * from './identity.js';
