import { InterruptedError } from '../errors/BackupError';

/**
 * Process items with at most `concurrency` in flight. Results keep the order
 * of `items` whatever order the work finishes in.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency = 1
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, async () => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await processor(items[index], index);
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Wait for `ms`, rejecting with InterruptedError as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError('Wait interrupted'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new InterruptedError('Wait interrupted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
