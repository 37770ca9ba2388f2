/**
 * Timeout and batching utilities for per-item media work
 */

import { errorMessage, TimeoutError } from '../../lib/types';
import { logger } from '../../utils/logger';

/**
 * Wraps a promise with a timeout. The wrapped promise is not cancelled on
 * timeout; its eventual result is ignored.
 * @param promise - Promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operation - Operation name for error messages
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string = 'Operation'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface BatchProgress {
  /** 0-based */
  batchIndex: number;
  batchCount: number;
  /** Items processed so far, including this batch */
  processed: number;
  total: number;
  /** Items of this batch that produced a value */
  accepted: number;
}

export interface BatchOptions<TOut> {
  batchSize: number;
  /** Omit to run items without a time limit */
  itemTimeoutMs?: number;
  /** Used in timeout messages */
  operation?: string;
  onItemError?: (error: unknown, index: number) => void;
  onBatchComplete?: (progress: BatchProgress, results: TOut[]) => void;
}

/**
 * Runs `worker` over `items` in fixed-size batches. Items inside a batch run
 * concurrently, each under its own timeout when one is set; a batch starts only after the
 * previous one has settled. Rejected, timed-out and null results are dropped.
 * Output keeps submission order.
 */
export async function processInBatches<TIn, TOut>(
  items: readonly TIn[],
  worker: (item: TIn) => Promise<TOut | null>,
  options: BatchOptions<TOut>
): Promise<TOut[]> {
  const { batchSize, itemTimeoutMs, operation = 'Item' } = options;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const results: TOut[] = [];
  const batchCount = Math.ceil(items.length / batchSize);

  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);

    const settled = await Promise.allSettled(
      // Deferred so a synchronous throw in `worker` stays inside its item
      batch.map((item) => {
        const pending = Promise.resolve().then(() => worker(item));
        return itemTimeoutMs === undefined ? pending : withTimeout(pending, itemTimeoutMs, operation);
      })
    );

    const accepted: TOut[] = [];
    settled.forEach((result, offset) => {
      if (result.status === 'fulfilled') {
        if (result.value !== null) accepted.push(result.value);
      } else {
        notify('onItemError', () => options.onItemError?.(result.reason, i + offset));
      }
    });
    results.push(...accepted);

    const progress: BatchProgress = {
      batchIndex: i / batchSize,
      batchCount,
      processed: i + batch.length,
      total: items.length,
      accepted: accepted.length,
    };
    notify('onBatchComplete', () => options.onBatchComplete?.(progress, accepted));
  }

  return results;
}

// Callback failures are logged and never abort the run
function notify(callback: string, invoke: () => void): void {
  try {
    invoke();
  } catch (error) {
    logger.debug(`${callback} callback failed: ${errorMessage(error)}`);
  }
}
