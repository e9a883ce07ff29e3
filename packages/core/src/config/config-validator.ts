/**
 * Config Validator - zod schema for .lexiscan/config.json
 *
 * Every field has a default, so `{}` validates to the full default config.
 */

import { z } from 'zod';

import { ConfigError } from '../errors/index.js';
import { DEFAULT_USER_AGENT } from '../extraction/http-extractor.js';
import { PATTERN_CATEGORIES } from '../types/patterns.js';

import type { ConfigIssue } from '../errors/index.js';

const labelsSchema = z
  .object({
    uncertainAt: z.number().min(0).max(100).default(15),
    likelyAiAt: z.number().min(0).max(100).default(30),
  })
  .strict()
  .default({})
  .refine((labels) => labels.uncertainAt <= labels.likelyAiAt, {
    message: 'uncertainAt must not exceed likelyAiAt',
    path: ['uncertainAt'],
  });

const categoryWeightsSchema = z
  .record(z.enum(PATTERN_CATEGORIES), z.number().nonnegative())
  .default({});

const scanSchema = z
  .object({
    concurrency: z.number().int().min(1).max(100).default(10),
    fetchTimeoutMs: z.number().int().positive().default(30_000),
    maxRetries: z.number().int().min(0).max(10).default(2),
    retryBaseDelayMs: z.number().int().nonnegative().default(500),
    minWords: z.number().int().min(1).default(20),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  })
  .strict()
  .default({});

export const configSchema = z
  .object({
    /** Absent means the patterns shipped with lexiscan-core */
    patternsDir: z.string().min(1).optional(),
    dbPath: z.string().min(1).default('.lexiscan/lexiscan.db'),
    labels: labelsSchema,
    categoryWeights: categoryWeightsSchema,
    scan: scanSchema,
  })
  .strict();

export type LexiscanConfigInput = z.input<typeof configSchema>;
export type ParsedConfig = z.output<typeof configSchema>;

/**
 * Validate raw config data, throwing a ConfigError that lists every issue
 */
export function validateConfig(data: unknown, source = 'config'): ParsedConfig {
  const parsed = configSchema.safeParse(data);
  if (parsed.success) {
    return parsed.data;
  }
  const issues: ConfigIssue[] = parsed.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  throw new ConfigError(`Invalid configuration in ${source}`, { source, issues });
}
