/**
 * Track Planner - chooses which discovered URLs a tracking run scans
 *
 * Order of operations:
 * 1. drop URLs matching an exclusion substring
 * 2. with rescanStale: stale stored scans of the domain first, then
 *    discovered URLs not stored yet
 * 3. otherwise, with skipExisting: discovered URLs not stored yet
 * 4. cap at `limit` (0 = no cap)
 */

import { dedupe, filterTargets } from '../extraction/discoverer.js';
import { identityKey } from '../types/identity.js';

import type { ScanStore } from '../store/scan-store.js';
import type { PatternVersions } from '../types/patterns.js';

export interface TrackPlanOptions {
  store: ScanStore;
  versions: PatternVersions;
  /** Lowercased host the stale lookup is restricted to */
  domain: string;
  exclude?: readonly string[] | undefined;
  skipExisting?: boolean | undefined;
  rescanStale?: boolean | undefined;
  limit?: number | undefined;
}

export interface TrackPlan {
  targets: string[];
  discovered: number;
  excluded: number;
  alreadyScanned: number;
  stale: number;
}

export async function planTrackTargets(discovered: readonly string[], options: TrackPlanOptions): Promise<TrackPlan> {
  const unique = dedupe(discovered);
  const filtered = filterTargets(unique, options.exclude ?? []);
  const skipExisting = options.skipExisting ?? true;

  const fresh: string[] = [];
  let alreadyScanned = 0;
  for (const url of filtered) {
    if (await options.store.isScanned({ kind: 'url', url })) {
      alreadyScanned++;
    } else {
      fresh.push(url);
    }
  }

  let targets: string[];
  let stale = 0;
  if (options.rescanStale) {
    const staleUrls = (await options.store.staleScans(options.versions, { domain: options.domain }))
      .filter((identity) => identity.kind === 'url')
      .map(identityKey);
    stale = staleUrls.length;
    targets = dedupe([...filterTargets(staleUrls, options.exclude ?? []), ...fresh]);
  } else if (skipExisting) {
    targets = fresh;
  } else {
    targets = filtered;
  }

  const limit = options.limit ?? 0;
  return {
    targets: limit > 0 ? targets.slice(0, limit) : targets,
    discovered: unique.length,
    excluded: unique.length - filtered.length,
    alreadyScanned,
    stale,
  };
}
