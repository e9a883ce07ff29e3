import { fileURLToPath } from 'node:url';

import { validateConfig } from './config-validator.js';

import type { LexiscanConfig } from './types.js';

/** Patterns shipped with lexiscan-core, next to src/ and dist/ */
export const BUNDLED_PATTERNS_DIR = fileURLToPath(new URL('../../patterns', import.meta.url));

const parsed = validateConfig({}, 'defaults');

export const DEFAULT_CONFIG: Readonly<LexiscanConfig> = Object.freeze({
  ...parsed,
  patternsDir: parsed.patternsDir ?? BUNDLED_PATTERNS_DIR,
});
