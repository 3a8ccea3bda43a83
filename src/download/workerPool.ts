export interface WorkerPoolOptions {
  concurrency: number;
  signal: AbortSignal;
}

export interface WorkerPoolHandlers<T, R> {
  run(item: T, index: number): Promise<R>;
  /** Result for an item no worker picked up before the signal aborted. */
  cancelled(item: T, index: number): R;
  /** Result for an item whose `run` threw. */
  failed(item: T, index: number, error: unknown): R;
}

/**
 * Fixed pool of workers over a shared cursor, taking items in input order.
 * Returns exactly one result per item, positioned like the input.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  options: WorkerPoolOptions,
  handlers: WorkerPoolHandlers<T, R>,
): Promise<R[]> {
  const results = new Map<number, R>();
  let cursor = 0;

  const workers = new Array(Math.max(1, Math.min(options.concurrency, items.length))).fill(null).map(async () => {
    while (!options.signal.aborted) {
      const current = cursor;
      cursor += 1;
      if (current >= items.length) {
        break;
      }
      try {
        results.set(current, await handlers.run(items[current], current));
      } catch (error) {
        results.set(current, handlers.failed(items[current], current, error));
      }
    }
  });
  await Promise.all(workers);

  return items.map((item, index) => {
    const result = results.get(index);
    return result !== undefined ? result : handlers.cancelled(item, index);
  });
}
