import * as fs from 'node:fs/promises';

import { InvalidArgumentError } from 'commander';

/**
 * Parse a batch file: one target per line; blank lines and `#` comments are
 * ignored
 */
export function parseTargetList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function readTargetFile(file: string): Promise<string[]> {
  return parseTargetList(await fs.readFile(file, 'utf-8'));
}

/**
 * Option parser for counts such as --limit (0 allowed)
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Option parser for --concurrency (at least 1)
 */
export function parseConcurrency(value: string): number {
  const parsed = parseCount(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Concurrency must be at least 1.');
  }
  return parsed;
}

/**
 * Accumulate a repeatable option into an array
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
