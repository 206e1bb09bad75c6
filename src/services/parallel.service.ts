/**
 * Parallel Processing Service
 *
 * Runs independent units of work through a bounded pool.
 * Uses p-limit to manage concurrency.
 */

import pLimit from 'p-limit';
import os from 'os';
import { batchLogger } from './logger.service.js';

// =============================================================================
// Concurrency Auto-Detection
// =============================================================================

let cachedIoConcurrency: number | undefined;

/**
 * Worker count for I/O-bound work: 2x CPU cores, capped at 16.
 */
export function getOptimalConcurrency(): number {
  if (cachedIoConcurrency !== undefined) return cachedIoConcurrency;

  const cpuCount = os.cpus().length;
  cachedIoConcurrency = Math.max(1, Math.min(cpuCount * 2, 16));

  batchLogger.debug(
    { cpuCount, concurrency: cachedIoConcurrency },
    `Auto-detected concurrency: ${cachedIoConcurrency}`
  );

  return cachedIoConcurrency;
}

// =============================================================================
// Types
// =============================================================================

export interface ParallelResult<T> {
  success: boolean;
  result?: T;
  error?: string;
  index: number;
}

export interface ParallelOptions {
  /** Maximum concurrent operations (default: auto-detected) */
  concurrency?: number;
  /** Progress callback called after each item */
  onProgress?: (completed: number, total: number, result: ParallelResult<unknown>) => void;
}

// =============================================================================
// Parallel Execution
// =============================================================================

/**
 * Execute operations in parallel with controlled concurrency.
 * A failing item is recorded in its result slot; the others keep running.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<ParallelResult<R>[]> {
  const { concurrency = getOptimalConcurrency(), onProgress } = options;

  if (concurrency < 1) {
    throw new Error('Concurrency must be at least 1');
  }

  const startTime = Date.now();
  const limit = pLimit(concurrency);
  const results: ParallelResult<R>[] = new Array(items.length);
  let successful = 0;
  let failed = 0;

  batchLogger.debug({
    total: items.length,
    concurrency,
  }, `Starting parallel processing of ${items.length} items with concurrency ${concurrency}`);

  const promises = items.map((item, index) =>
    limit(async () => {
      let parallelResult: ParallelResult<R>;

      try {
        const result = await fn(item, index);
        successful++;
        parallelResult = { success: true, result, index };
      } catch (error) {
        failed++;
        const errorMessage = error instanceof Error ? error.message : String(error);
        parallelResult = { success: false, error: errorMessage, index };

        batchLogger.warn({
          index,
          error: errorMessage,
        }, `Item ${index} failed: ${errorMessage}`);
      }

      results[index] = parallelResult;
      onProgress?.(successful + failed, items.length, parallelResult);
      return parallelResult;
    })
  );

  await Promise.all(promises);

  const duration = Date.now() - startTime;

  batchLogger.debug({
    total: items.length,
    successful,
    failed,
    duration,
  }, `Parallel processing complete: ${successful} succeeded, ${failed} failed in ${duration}ms`);

  return results;
}
