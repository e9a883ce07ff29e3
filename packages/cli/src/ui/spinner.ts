/**
 * Spinner - progress spinners for fetches and loads
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

type SpinnerColor = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export interface SpinnerOptions {
  text?: string;
  color?: SpinnerColor;
  /** Whether to show the spinner (false in CI, or when printing JSON) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;

  constructor(options: SpinnerOptions = {}) {
    const baseOptions = {
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? !process.env['CI'],
    } as const;

    this.spinner = options.text ? ora({ ...baseOptions, text: options.text }) : ora(baseOptions);
  }

  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }
}

export function createSpinner(options?: SpinnerOptions): Spinner {
  return new Spinner(options);
}

/**
 * Run an async operation with a spinner
 */
export async function withSpinner<T>(
  text: string,
  operation: () => Promise<T>,
  options?: {
    enabled?: boolean;
    successText?: string | ((result: T) => string);
    failText?: string | ((error: Error) => string);
  }
): Promise<T> {
  const spinner = createSpinner({ text, enabled: options?.enabled ?? !process.env['CI'] });
  spinner.start();

  try {
    const result = await operation();
    const successText =
      typeof options?.successText === 'function' ? options.successText(result) : options?.successText;
    spinner.succeed(successText);
    return result;
  } catch (caught) {
    const error = caught instanceof Error ? caught : new Error(String(caught));
    const failText =
      typeof options?.failText === 'function' ? options.failText(error) : options?.failText ?? error.message;
    spinner.fail(failText);
    throw caught;
  }
}

/**
 * Status indicators for non-spinner output
 */
export const status = {
  success(message: string): void {
    console.error(chalk.green('✔'), message);
  },

  error(message: string): void {
    console.error(chalk.red('✖'), message);
  },

  warning(message: string): void {
    console.error(chalk.yellow('⚠'), message);
  },

  info(message: string): void {
    console.error(chalk.blue('ℹ'), message);
  },
};
