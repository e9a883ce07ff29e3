/**
 * Error taxonomy
 *
 * - ConfigError: malformed pattern definition or configuration; fatal before scanning
 * - DetectionError: one detector cannot compute its metric; the pattern scores 0
 * - FetchError / ExtractionError: a target is unreachable or has no usable text
 * - PersistenceError: the store could not commit a target's results
 * - CancelledError: the batch was aborted before the target finished
 */

export type LexiscanErrorCode =
  | 'CONFIG'
  | 'DETECTION'
  | 'FETCH'
  | 'EXTRACTION'
  | 'PERSISTENCE'
  | 'CANCELLED';

/**
 * Base class for every error raised by lexiscan
 */
export class LexiscanError extends Error {
  public readonly code: LexiscanErrorCode;
  public readonly errorCause: Error | undefined;

  constructor(code: LexiscanErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'LexiscanError';
    this.code = code;
    this.errorCause = cause === undefined ? undefined : toError(cause);
  }
}

/**
 * A single validation problem inside a config or pattern source
 */
export interface ConfigIssue {
  /** Dotted path to the offending field, e.g. `params.threshold_high` */
  path: string;
  message: string;
}

export class ConfigError extends LexiscanError {
  public readonly source: string | undefined;
  public readonly issues: ConfigIssue[];

  constructor(message: string, options: { source?: string; issues?: ConfigIssue[]; cause?: unknown } = {}) {
    super('CONFIG', message, options.cause);
    this.name = 'ConfigError';
    this.source = options.source;
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues one per line for terminal output
   */
  formatIssues(): string {
    if (this.issues.length === 0) {return this.message;}
    return this.issues.map((i) => `  - ${i.path || '(root)'}: ${i.message}`).join('\n');
  }
}

export class DetectionError extends LexiscanError {
  constructor(
    public readonly patternId: string,
    message: string
  ) {
    super('DETECTION', message);
    this.name = 'DetectionError';
  }
}

export class FetchError extends LexiscanError {
  /** Timeouts, network failures and 5xx responses may be retried */
  public readonly transient: boolean;
  public readonly status: number | undefined;

  constructor(message: string, options: { transient: boolean; status?: number; cause?: unknown }) {
    super('FETCH', message, options.cause);
    this.name = 'FetchError';
    this.transient = options.transient;
    this.status = options.status;
  }
}

export class ExtractionError extends LexiscanError {
  constructor(message: string, cause?: unknown) {
    super('EXTRACTION', message, cause);
    this.name = 'ExtractionError';
  }
}

export class PersistenceError extends LexiscanError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE', message, cause);
    this.name = 'PersistenceError';
  }
}

export class CancelledError extends LexiscanError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/**
 * Whether an error is worth retrying
 */
export function isTransient(error: unknown): boolean {
  return error instanceof FetchError && error.transient;
}
