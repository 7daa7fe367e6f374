import { debugLogger } from './debug-logger';

export interface ConcurrencyOptions {
  /** Maximum number of concurrent operations. Default: 8 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
  /** Stop starting new items once this signal aborts */
  signal?: AbortSignal;
}

export interface ConcurrencyResult<T> {
  successful: Array<{ value: T; index: number }>;
  failed: Array<{ error: Error; index: number }>;
  /** Items never started because the signal aborted first */
  skipped: number[];
}

/**
 * Process items through a fixed-size pool of workers.
 * Results keep the index of their input so callers can correlate outcomes.
 *
 * @example
 * const results = await processConcurrently(
 *   feeds,
 *   async (feed) => fetchFeed(feed),
 *   { concurrency: 4, label: 'Feed Fetch' }
 * );
 */
export async function processConcurrently<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<R>> {
  const { concurrency = 8, label = 'Operation', signal } = options;

  const successful: Array<{ value: R; index: number }> = [];
  const failed: Array<{ error: Error; index: number }> = [];
  const skipped: number[] = [];

  if (items.length === 0) {
    return { successful, failed, skipped };
  }

  const stepId = debugLogger.stepStart('CONCURRENCY', `${label} (${items.length} items, concurrency: ${concurrency})`, {
    itemCount: items.length,
    concurrency,
  });
  const startTime = Date.now();

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      if (signal?.aborted) {
        skipped.push(index);
        continue;
      }
      try {
        const value = await fn(items[index], index);
        successful.push({ value, index });
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        debugLogger.warn('CONCURRENCY', `${label}: Item ${index + 1}/${items.length} failed`, {
          error: err.message,
        });
        failed.push({ error: err, index });
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const duration = Date.now() - startTime;
  debugLogger.stepFinish(stepId, {
    successful: successful.length,
    failed: failed.length,
    skipped: skipped.length,
    avgTimePerItem: `${(duration / items.length).toFixed(0)}ms`,
  });

  return { successful, failed, skipped };
}

/**
 * Split an array into chunks of a specified size.
 *
 * @example
 * chunkArray([1,2,3,4,5], 2) // [[1,2], [3,4], [5]]
 */
export function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Reject with TimeoutError once the signal aborts, without waiting for the
 * promise to settle. Without a signal the promise is returned as is.
 */
export async function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, message: string): Promise<T> {
  if (!signal) {
    return promise;
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new TimeoutError(message));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Collapses concurrent calls for the same key into one in-flight promise.
 * The entry is released as soon as the promise settles.
 */
export class KeyedSingleFlight<T> {
  private inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
