/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';

export interface BoundedOptions {
  /** Maximum tasks running at once */
  concurrency: number;
  /**
   * Maximum tasks submitted but not yet finished (running + waiting).
   * Defaults to twice the concurrency.
   */
  queueSize?: number;
  /** Stops intake and skips queued items; running ones finish */
  signal?: AbortSignal;
}

export interface PoolSummary {
  started: number;
  aborted: boolean;
}

/**
 * Run `worker` over `items` with a fixed number of workers. Items are
 * pulled lazily, so a large iterable never turns into an equally large
 * backlog of pending promises.
 *
 * If a worker throws, intake stops, the remaining tasks drain and the first
 * error is rethrown.
 */
export async function forEachBounded<T>(
  items: Iterable<T>,
  worker: (item: T) => Promise<void>,
  options: BoundedOptions
): Promise<PoolSummary> {
  const { concurrency, signal } = options;
  const queueSize = Math.max(options.queueSize ?? concurrency * 2, concurrency);
  const limit = pLimit(concurrency);
  const inFlight = new Set<Promise<void>>();
  let failure: { error: unknown } | undefined;
  let started = 0;

  for (const item of items) {
    if (signal?.aborted || failure) break;

    // queued tasks check again: the signal may fire while they wait
    const task: Promise<void> = limit(async () => {
      if (signal?.aborted) return;
      started++;
      await worker(item);
    })
      .catch((error: unknown) => {
        failure ??= { error };
      })
      .finally(() => {
        inFlight.delete(task);
      });

    inFlight.add(task);

    if (inFlight.size >= queueSize) {
      await Promise.race(inFlight);
    }
  }

  await Promise.all(inFlight);

  if (failure) {
    throw failure.error;
  }

  return { started, aborted: signal?.aborted ?? false };
}

/**
 * Retry a task with exponential backoff
 * @param maxRetries Retries after the first attempt
 * @param delayMs Initial delay in milliseconds
 */
export async function retryWithBackoff<T>(
  task: () => Promise<T>,
  maxRetries = 3,
  delayMs = 1000
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await task();
    } catch (error) {
      lastError = error;

      if (attempt < maxRetries) {
        await sleep(delayMs * Math.pow(2, attempt));
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
