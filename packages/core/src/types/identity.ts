/**
 * Scan identity helpers
 *
 * A target is either an http(s) URL or a local file path, never both.
 */

import * as path from 'node:path';

import type { ScanIdentity } from './results.js';

const URL_RE = /^https?:\/\//i;

export function isUrlTarget(target: string): boolean {
  return URL_RE.test(target);
}

/**
 * Resolve a command-line target to its identity. File paths are made
 * absolute so the same file always maps to the same row.
 */
export function identityFromTarget(target: string): ScanIdentity {
  return isUrlTarget(target)
    ? { kind: 'url', url: target }
    : { kind: 'file', filePath: path.resolve(target) };
}

/**
 * The url or file path behind an identity
 */
export function identityKey(identity: ScanIdentity): string {
  return identity.kind === 'url' ? identity.url : identity.filePath;
}

/**
 * Host name of a URL, lowercased; empty for files and malformed URLs
 */
export function domainOf(identity: ScanIdentity): string {
  if (identity.kind !== 'url') {return '';}
  try {
    return new URL(identity.url).hostname.toLowerCase();
  } catch {
    return '';
  }
}
