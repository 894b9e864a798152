/**
 * Run a worker over many items (typically distinct containers) with bounded
 * concurrency. Items never share a handle, so they need no locking here.
 */

import { describeError } from './errors.js';

export type BatchItemResult<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; error: string; reason: string }
  | { item: T; status: 'skipped' };

export interface BatchOptions {
  /** Workers running at once (default 4) */
  concurrency?: number;
  /** Stops dispatching new items; running ones finish */
  signal?: AbortSignal;
}

export async function runBatch<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  opts: BatchOptions = {},
): Promise<Array<BatchItemResult<T, R>>> {
  const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 4));
  const results: Array<BatchItemResult<T, R> | undefined> = Array.from({ length: items.length }, () => undefined);
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      if (opts.signal?.aborted) return;
      const index = next++;
      const item = items[index];
      try {
        results[index] = { item, status: 'fulfilled', value: await worker(item, index) };
      } catch (err) {
        results[index] = { item, status: 'rejected', ...describeError(err) };
      }
    }
  }

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, () => lane()));
  return results.map((r, i) => r ?? { item: items[i], status: 'skipped' });
}
