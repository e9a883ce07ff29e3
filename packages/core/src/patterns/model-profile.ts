/**
 * Model Profiles - expected pattern scores for a known writing source
 *
 * A profile lives at `<patternsDir>/models/<name>.json` as
 * `{ "profile": { "<patternId>": <expected score in [0, 1]> } }`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { z } from 'zod';

import { ConfigError, errorMessage } from '../errors/index.js';

import { MODELS_DIR } from './pattern-loader.js';

import type { PatternResult } from '../types/results.js';

const profileSchema = z.object({
  profile: z.record(z.string(), z.number().min(0).max(1)),
});

export type ModelProfile = Readonly<Record<string, number>>;

export interface ProfileComparison {
  /** 1 − mean absolute deviation over overlapping patterns; 0 without overlap */
  similarity: number;
  /** Pattern id → |actual − expected| */
  deviations: Record<string, number>;
}

/**
 * Names of the profiles available under a patterns directory
 */
export async function listModelProfiles(patternsDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(path.join(patternsDir, MODELS_DIR));
    return entries.filter((e) => e.endsWith('.json')).map((e) => e.slice(0, -'.json'.length)).sort();
  } catch {
    return [];
  }
}

export async function loadModelProfile(patternsDir: string, name: string): Promise<ModelProfile> {
  const file = path.join(patternsDir, MODELS_DIR, `${name}.json`);
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch {
    const available = await listModelProfiles(patternsDir);
    throw new ConfigError(
      `Model profile '${name}' not found. Available: ${available.join(', ') || 'none'}`,
      { source: file }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Model profile is not valid JSON: ${errorMessage(error)}`, { source: file, cause: error });
  }

  const parsed = profileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid model profile '${name}'`, {
      source: file,
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return Object.freeze({ ...parsed.data.profile });
}

/**
 * Compare actual pattern scores with a profile's expected scores
 */
export function compareModelProfile(
  results: readonly PatternResult[],
  profile: ModelProfile
): ProfileComparison {
  const actual = new Map(results.map((r) => [r.patternId, r.normalizedScore]));
  const deviations: Record<string, number> = {};

  for (const patternId of Object.keys(profile).sort()) {
    const score = actual.get(patternId);
    const expected = profile[patternId];
    if (score === undefined || expected === undefined) {continue;}
    deviations[patternId] = round3(Math.abs(score - expected));
  }

  const values = Object.values(deviations);
  const similarity = values.length > 0
    ? round3(1 - values.reduce((sum, v) => sum + v, 0) / values.length)
    : 0;

  return { similarity, deviations };
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
