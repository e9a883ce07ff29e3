import { ConfigError, errorMessage } from 'lexiscan-core';

import { status } from './ui/spinner.js';

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIG: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigError ? ExitCode.CONFIG : ExitCode.FAILURE;
}

/**
 * Report a command failure on stderr and set the process exit code
 */
export function reportError(error: unknown): void {
  if (error instanceof ConfigError) {
    status.error(error.message);
    if (error.issues.length > 0) {
      console.error(error.formatIssues());
    }
  } else {
    status.error(errorMessage(error));
  }
  process.exitCode = exitCodeFor(error);
}
