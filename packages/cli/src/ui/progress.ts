/**
 * Progress - progress bar for batch scans
 */

import chalk from 'chalk';
import { SingleBar, Presets } from 'cli-progress';

export interface ProgressOptions {
  total: number;
  format?: string;
  /** Whether progress is enabled (false in CI mode) */
  enabled?: boolean;
  clearOnComplete?: boolean;
}

const SCAN_FORMAT = `${chalk.cyan('{bar}')} {percentage}% | {value}/{total} targets | ETA: {eta}s | {task}`;

export class Progress {
  private bar: SingleBar;
  private enabled: boolean;

  constructor(options: ProgressOptions) {
    this.enabled = options.enabled ?? !process.env['CI'];

    this.bar = new SingleBar(
      {
        format: options.format ?? SCAN_FORMAT,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
        clearOnComplete: options.clearOnComplete ?? false,
        stopOnComplete: true,
        etaBuffer: 50,
        fps: 10,
      },
      Presets.shades_classic
    );

    if (this.enabled) {
      this.bar.start(options.total, 0, { task: '' });
    }
  }

  /**
   * Set progress to `value` and show `task` as the current item
   */
  update(value: number, task?: string): this {
    if (this.enabled) {
      this.bar.update(value, task === undefined ? undefined : { task });
    }
    return this;
  }

  stop(): this {
    if (this.enabled) {
      this.bar.stop();
    }
    return this;
  }
}
