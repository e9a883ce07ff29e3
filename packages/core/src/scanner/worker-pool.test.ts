/**
 * Worker Pool and retry tests
 */

import { describe, it, expect } from 'vitest';

import { CancelledError, FetchError } from '../errors/index.js';

import { computeRetryDelayMs, sleep, withRetry } from './retry.js';
import { WorkerPool } from './worker-pool.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WorkerPool', () => {
  it('returns results in input order', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 4 });
    pool.setProcessor(async (n) => {
      await delay(40 - n * 10);
      return n * 2;
    });

    const results = await pool.processBatch([0, 1, 2, 3]);
    expect(results.map((r) => (r.status === 'completed' ? r.result : null))).toEqual([0, 2, 4, 6]);
  });

  it('never runs more than maxWorkers tasks at once', async () => {
    let active = 0;
    let peak = 0;
    const pool = new WorkerPool<number, void>({ maxWorkers: 3 });
    pool.setProcessor(async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    await pool.processBatch(Array.from({ length: 10 }, (_, i) => i));
    expect(peak).toBe(3);
    expect(pool.getStats().completedTasks).toBe(10);
  });

  it('isolates a failing task', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 2 });
    pool.setProcessor(async (n) => {
      if (n === 1) {throw new Error('boom');}
      return n;
    });

    const results = await pool.processBatch([0, 1, 2]);
    expect(results.map((r) => r.status)).toEqual(['completed', 'failed', 'completed']);
    const failed = results[1];
    expect(failed?.status === 'failed' && failed.error.message).toBe('boom');
    expect(pool.getStats().failedTasks).toBe(1);
  });

  it('cancels everything when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const pool = new WorkerPool<number, number>();
    let calls = 0;
    pool.setProcessor(async (n) => {
      calls++;
      return n;
    });

    const results = await pool.processBatch([1, 2, 3], { signal: controller.signal });
    expect(results.map((r) => r.status)).toEqual(['cancelled', 'cancelled', 'cancelled']);
    expect(calls).toBe(0);
  });

  it('does not start queued tasks after an abort', async () => {
    const controller = new AbortController();
    const pool = new WorkerPool<number, number>({ maxWorkers: 1 });
    pool.setProcessor(async (n) => {
      if (n === 0) {controller.abort();}
      return n;
    });

    const results = await pool.processBatch([0, 1, 2], { signal: controller.signal });
    expect(results.map((r) => r.status)).toEqual(['completed', 'cancelled', 'cancelled']);
  });

  it('announces each result as it settles', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 3 });
    pool.setProcessor(async (n) => {
      await delay(30 - n * 10);
      return n;
    });
    const settled: number[] = [];
    pool.onTaskSettled((r) => settled.push(r.index));

    const results = await pool.processBatch([0, 1, 2]);
    expect(settled).toEqual([2, 1, 0]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
  });

  it('resolves an empty batch', async () => {
    const pool = new WorkerPool<number, number>();
    pool.setProcessor(async (n) => n);
    expect(await pool.processBatch([])).toEqual([]);
  });

  it('requires a processor', async () => {
    await expect(new WorkerPool<number, number>().processBatch([1])).rejects.toThrow(
      'No processor set. Call setProcessor() first.'
    );
  });
});

describe('retry', () => {
  it('doubles the delay up to the cap', () => {
    expect(computeRetryDelayMs(0, 500)).toBe(500);
    expect(computeRetryDelayMs(2, 500)).toBe(2000);
    expect(computeRetryDelayMs(10, 500)).toBe(30000);
    expect(computeRetryDelayMs(3, 500, 1000)).toBe(1000);
  });

  it('retries transient failures until one succeeds', async () => {
    const retries: Array<[number, number]> = [];
    const value = await withRetry(
      async (attempt) => {
        if (attempt < 2) {throw new FetchError('HTTP 503', { transient: true, status: 503 });}
        return 'ok';
      },
      { maxRetries: 2, baseDelayMs: 1, onRetry: (_error, attempt, delayMs) => retries.push([attempt, delayMs]) }
    );

    expect(value).toBe('ok');
    expect(retries).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('does not retry permanent failures', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new FetchError('HTTP 404', { transient: false, status: 404 });
        },
        { maxRetries: 3, baseDelayMs: 1 }
      )
    ).rejects.toThrow('HTTP 404');
    expect(calls).toBe(1);
  });

  it('gives up after maxRetries', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new FetchError('timeout', { transient: true });
        },
        { maxRetries: 2, baseDelayMs: 1 }
      )
    ).rejects.toThrow('timeout');
    expect(calls).toBe(3);
  });

  it('stops sleeping when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
