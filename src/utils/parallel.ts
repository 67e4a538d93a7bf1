/**
 * Parallel Processing Utilities
 *
 * Helpers for running async operations with a concurrency cap.
 */

export interface ParallelOptions {
  /** Maximum number of concurrent operations (default: 5) */
  concurrency?: number;
  /** Whether to stop on first error (default: false - collect all results) */
  stopOnError?: boolean;
}

export interface ParallelResult<T> {
  /** Results in same order as input items */
  results: (T | Error)[];
  /** Number of successful operations */
  successCount: number;
  /** Number of failed operations */
  errorCount: number;
}

/**
 * Run async operations in parallel with concurrency limit
 *
 * @returns Results array in same order as input, with errors captured
 *
 * @example
 * const results = await parallelMap(paths, async (path) => {
 *   return await pipeline.generate(path);
 * }, { concurrency: 4 });
 */
export async function parallelMap<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<ParallelResult<R>> {
  const { concurrency = 5, stopOnError = false } = options;

  const results: (R | Error)[] = new Array(items.length);
  let successCount = 0;
  let errorCount = 0;
  let stopped = false;

  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (!stopped) {
      // Claim the index before any async work
      const index = nextIndex;
      if (index >= items.length) {
        break;
      }
      nextIndex++;

      const item = items[index];

      try {
        results[index] = await fn(item, index);
        successCount++;
      } catch (error) {
        results[index] = error instanceof Error ? error : new Error(String(error));
        errorCount++;

        if (stopOnError) {
          stopped = true;
        }
      }
    }
  };

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(concurrency, items.length);

  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);

  return { results, successCount, errorCount };
}

/**
 * Check if a result from parallelMap is an error
 */
export function isParallelError<T>(result: T | Error): result is Error {
  return result instanceof Error;
}

/**
 * A concurrency gate shared by independent callers
 */
export interface Limiter {
  /** Run a task once a slot is free */
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks currently holding a slot */
  readonly active: number;
  /** Tasks waiting for a slot */
  readonly pending: number;
}

/**
 * Create a limiter that allows at most `concurrency` tasks to run at once.
 * Waiting tasks start in FIFO order.
 */
export function createLimiter(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new Error('Concurrency must be a positive integer');
  }

  const queue: Array<() => void> = [];
  let active = 0;

  const release = (): void => {
    active--;
    const next = queue.shift();
    if (next) {
      next();
    }
  };

  const acquire = (): Promise<void> => {
    if (active < concurrency) {
      active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      queue.push(() => {
        active++;
        resolve();
      });
    });
  };

  return {
    async run<T>(task: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await task();
      } finally {
        release();
      }
    },
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    },
  };
}
