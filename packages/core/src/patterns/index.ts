export { PatternRegistry } from './pattern-registry.js';
export type { PatternSource, RegistryLoadOptions } from './pattern-registry.js';
export { parsePattern, patternFileSchema } from './pattern-schema.js';
export type { PatternFile, PatternParseResult } from './pattern-schema.js';
export { findPatternFiles, readPatternSources, loadPatternRegistry, MODELS_DIR } from './pattern-loader.js';
export { loadModelProfile, listModelProfiles, compareModelProfile } from './model-profile.js';
export type { ModelProfile, ProfileComparison } from './model-profile.js';
