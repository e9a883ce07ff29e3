/**
 * Worker Pool - bounded-concurrency task processing
 *
 * Runs an async processor over a batch of inputs with at most `maxWorkers`
 * tasks in flight. Results come back in input order whatever order the tasks
 * finish in. Once the batch signal aborts, tasks that have not started are
 * reported as cancelled; running tasks are left to observe the signal.
 * Each result is also emitted as `taskSettled` the moment it is known.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool<string, AnalysisResult>({ maxWorkers: 4 });
 * pool.setProcessor((target) => analyzeTarget(target));
 * const results = await pool.processBatch(targets, { signal });
 * ```
 */

import { EventEmitter } from 'node:events';

import { toError } from '../errors/index.js';

export interface WorkerPoolOptions {
  /**
   * Maximum number of tasks in flight
   * @default 10
   */
  maxWorkers?: number;
}

export type TaskStatus = 'completed' | 'failed' | 'cancelled';

/**
 * Outcome of one input, tagged with its position in the batch
 */
export type TaskResult<TOutput> =
  | { index: number; status: 'completed'; result: TOutput; duration: number }
  | { index: number; status: 'failed'; error: Error; duration: number }
  | { index: number; status: 'cancelled'; duration: 0 };

export interface WorkerPoolStats {
  activeTasks: number;
  completedTasks: number;
  failedTasks: number;
  cancelledTasks: number;
  /** Average duration of completed and failed tasks, in milliseconds */
  averageDuration: number;
  maxWorkers: number;
}

/**
 * Events emitted by the worker pool
 */
export interface WorkerPoolEvents<TOutput> {
  taskSettled: (result: TaskResult<TOutput>) => void;
}

export type TaskProcessor<TInput, TOutput> = (input: TInput, index: number) => Promise<TOutput>;

export interface BatchOptions {
  signal?: AbortSignal | undefined;
}

const DEFAULT_MAX_WORKERS = 10;

export class WorkerPool<TInput, TOutput> extends EventEmitter {
  private readonly maxWorkers: number;
  private processor: TaskProcessor<TInput, TOutput> | null = null;
  private activeCount = 0;
  private completedCount = 0;
  private failedCount = 0;
  private cancelledCount = 0;
  private totalDuration = 0;

  constructor(options: WorkerPoolOptions = {}) {
    super();
    const requested = Math.floor(options.maxWorkers ?? DEFAULT_MAX_WORKERS);
    this.maxWorkers = Number.isFinite(requested) && requested >= 1 ? requested : 1;
  }

  onTaskSettled(listener: WorkerPoolEvents<TOutput>['taskSettled']): this {
    return this.on('taskSettled', listener);
  }

  setProcessor(processor: TaskProcessor<TInput, TOutput>): void {
    this.processor = processor;
  }

  /**
   * Process a batch of inputs and wait for all of them to settle
   */
  async processBatch(inputs: readonly TInput[], options: BatchOptions = {}): Promise<TaskResult<TOutput>[]> {
    const processor = this.processor;
    if (!processor) {
      throw new Error('No processor set. Call setProcessor() first.');
    }

    const queue = inputs.map((input, index) => ({ input, index }));
    const results: TaskResult<TOutput>[] = [];
    const { signal } = options;

    await new Promise<void>((resolve) => {
      let running = 0;

      const launch = (): void => {
        while (running < this.maxWorkers && queue.length > 0) {
          const next = queue.shift();
          if (!next) {break;}

          if (signal?.aborted) {
            this.cancelledCount++;
            this.settle(results, { index: next.index, status: 'cancelled', duration: 0 });
            continue;
          }

          running++;
          void this.runTask(processor, next.input, next.index).then((result) => {
            running--;
            try {
              this.settle(results, result);
            } finally {
              launch();
            }
          });
        }

        if (running === 0 && queue.length === 0) {
          resolve();
        }
      };

      launch();
    });

    return results.sort((a, b) => a.index - b.index);
  }

  getStats(): WorkerPoolStats {
    const finished = this.completedCount + this.failedCount;
    return {
      activeTasks: this.activeCount,
      completedTasks: this.completedCount,
      failedTasks: this.failedCount,
      cancelledTasks: this.cancelledCount,
      averageDuration: finished > 0 ? this.totalDuration / finished : 0,
      maxWorkers: this.maxWorkers,
    };
  }

  private settle(results: TaskResult<TOutput>[], result: TaskResult<TOutput>): void {
    results.push(result);
    this.emit('taskSettled', result);
  }

  /**
   * Run one task; never rejects
   */
  private async runTask(
    processor: TaskProcessor<TInput, TOutput>,
    input: TInput,
    index: number
  ): Promise<TaskResult<TOutput>> {
    this.activeCount++;
    const startedAt = Date.now();

    try {
      const result = await processor(input, index);
      const duration = Date.now() - startedAt;
      this.completedCount++;
      this.totalDuration += duration;
      return { index, status: 'completed', result, duration };
    } catch (caught) {
      const error = toError(caught);
      const duration = Date.now() - startedAt;
      this.failedCount++;
      this.totalDuration += duration;
      return { index, status: 'failed', error, duration };
    } finally {
      this.activeCount--;
    }
  }
}
