export { ConfigLoader, loadConfig, LEXISCAN_DIR } from './config-loader.js';
export type { ConfigLoaderOptions, ConfigLoadResult } from './config-loader.js';
export { configSchema, validateConfig } from './config-validator.js';
export type { LexiscanConfigInput } from './config-validator.js';
export { DEFAULT_CONFIG, BUNDLED_PATTERNS_DIR } from './defaults.js';
export type { LexiscanConfig, ScanSettings } from './types.js';
