/**
 * Pattern Registry - immutable snapshot of loaded pattern definitions
 *
 * Validates every pattern source, rejects duplicate ids and inconsistent
 * thresholds, and indexes the result. A snapshot is never mutated; reloading
 * builds a new one, checked against the previous snapshot so that a pattern's
 * version never goes backwards.
 *
 * @example
 * ```typescript
 * const registry = PatternRegistry.load([
 *   { source: 'em-dash.json', data: { id: 'em_dash', version: 3, ... } },
 * ]);
 *
 * registry.all('punctuation');
 * registry.versions(); // { em_dash: 3 }
 * ```
 */

import { ConfigError } from '../errors/index.js';

import { parsePattern } from './pattern-schema.js';

import type { ConfigIssue } from '../errors/index.js';
import type { PatternCategory, PatternDefinition, PatternVersions } from '../types/patterns.js';

/**
 * Unvalidated pattern data and where it came from
 */
export interface PatternSource {
  /** File path or other label, used in error messages */
  source: string;
  data: unknown;
}

export interface RegistryLoadOptions {
  /** Snapshot being replaced; versions must not decrease relative to it */
  previous?: PatternRegistry;
}

export class PatternRegistry {
  /** Patterns in id-ascending order */
  private readonly ordered: readonly PatternDefinition[];
  private readonly byId: ReadonlyMap<string, PatternDefinition>;

  private constructor(patterns: PatternDefinition[]) {
    const sorted = [...patterns].sort((a, b) => compareIds(a.id, b.id));
    this.ordered = Object.freeze(sorted.map(freezePattern));
    this.byId = new Map(this.ordered.map((p) => [p.id, p]));
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Validate sources and build a snapshot
   *
   * @throws ConfigError listing every schema violation, duplicate id and
   *         version regression found across all sources
   */
  static load(sources: readonly PatternSource[], options: RegistryLoadOptions = {}): PatternRegistry {
    const issues: ConfigIssue[] = [];
    const patterns: PatternDefinition[] = [];
    const seen = new Map<string, string>();

    for (const { source, data } of sources) {
      const result = parsePattern(data, source);
      if (!result.success) {
        issues.push(...result.issues.map((i) => ({ path: prefix(source, i.path), message: i.message })));
        continue;
      }

      const pattern = result.pattern;
      const firstSource = seen.get(pattern.id);
      if (firstSource !== undefined) {
        issues.push({
          path: prefix(source, 'id'),
          message: `duplicate pattern id '${pattern.id}' (first defined in ${firstSource})`,
        });
        continue;
      }
      seen.set(pattern.id, source);

      const previous = options.previous?.lookup(pattern.id);
      if (previous && pattern.version < previous.version) {
        issues.push({
          path: prefix(source, 'version'),
          message: `version ${pattern.version} of '${pattern.id}' is older than loaded version ${previous.version}`,
        });
        continue;
      }

      patterns.push(pattern);
    }

    if (issues.length > 0) {
      throw new ConfigError(`Invalid pattern definitions (${issues.length} issue(s))`, { issues });
    }

    return new PatternRegistry(patterns);
  }

  /**
   * Build a new snapshot from fresh sources, checked against this one
   */
  reload(sources: readonly PatternSource[]): PatternRegistry {
    return PatternRegistry.load(sources, { previous: this });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  lookup(id: string): PatternDefinition | undefined {
    return this.byId.get(id);
  }

  /**
   * All patterns, id ascending, optionally restricted to one category
   */
  all(category?: PatternCategory): readonly PatternDefinition[] {
    if (category === undefined) {return this.ordered;}
    return this.ordered.filter((p) => p.category === category);
  }

  /**
   * Patterns that are evaluated during a scan
   */
  enabled(category?: PatternCategory): readonly PatternDefinition[] {
    return this.all(category).filter((p) => p.enabled);
  }

  /**
   * Current version of every enabled pattern
   */
  versions(): PatternVersions {
    const versions: Record<string, number> = {};
    for (const pattern of this.enabled()) {
      versions[pattern.id] = pattern.version;
    }
    return Object.freeze(versions);
  }

  /**
   * Categories that have at least one pattern, in declaration order of ids
   */
  categories(): PatternCategory[] {
    return [...new Set(this.ordered.map((p) => p.category))];
  }

  get size(): number {
    return this.ordered.length;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Code-unit comparison keeps ordering independent of locale */
function compareIds(a: string, b: string): number {
  if (a < b) {return -1;}
  return a > b ? 1 : 0;
}

function prefix(source: string, path: string): string {
  return path ? `${source}#${path}` : source;
}

function freezePattern(pattern: PatternDefinition): PatternDefinition {
  Object.freeze(pattern.params);
  return Object.freeze(pattern);
}
