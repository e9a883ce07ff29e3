/**
 * Pattern Loader - reads pattern definitions from a directory
 *
 * Every `*.json` file under the directory is one pattern. Files whose name
 * starts with `_` and everything under `models/` are not patterns.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { ConfigError, errorMessage } from '../errors/index.js';

import { PatternRegistry } from './pattern-registry.js';

import type { PatternSource, RegistryLoadOptions } from './pattern-registry.js';

/** Subdirectory holding model profiles rather than patterns */
export const MODELS_DIR = 'models';

/**
 * List pattern files under a directory, sorted for reproducible load order
 */
export async function findPatternFiles(patternsDir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (dir === patternsDir && entry.name === MODELS_DIR) {continue;}
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith('.json') && !entry.name.startsWith('_')) {
        files.push(fullPath);
      }
    }
  }

  try {
    await walk(patternsDir);
  } catch (error) {
    throw new ConfigError(`Cannot read patterns directory: ${errorMessage(error)}`, {
      source: patternsDir,
      cause: error,
    });
  }

  return files.sort();
}

/**
 * Read and JSON-parse every pattern file
 *
 * @throws ConfigError when a file cannot be read or is not valid JSON
 */
export async function readPatternSources(patternsDir: string): Promise<PatternSource[]> {
  const files = await findPatternFiles(patternsDir);
  const sources: PatternSource[] = [];

  for (const file of files) {
    const source = path.relative(patternsDir, file);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read pattern file: ${errorMessage(error)}`, { source, cause: error });
    }

    try {
      const data: unknown = JSON.parse(content);
      sources.push({ source, data });
    } catch (error) {
      throw new ConfigError(`Pattern file is not valid JSON: ${errorMessage(error)}`, {
        source,
        issues: [{ path: source, message: errorMessage(error) }],
        cause: error,
      });
    }
  }

  return sources;
}

/**
 * Load a registry snapshot from a patterns directory
 */
export async function loadPatternRegistry(
  patternsDir: string,
  options: RegistryLoadOptions = {}
): Promise<PatternRegistry> {
  const sources = await readPatternSources(patternsDir);
  if (sources.length === 0) {
    throw new ConfigError(`No pattern files found in ${patternsDir}`, { source: patternsDir });
  }
  return PatternRegistry.load(sources, options);
}
