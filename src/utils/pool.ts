/**
 * Bounded worker pool
 */

export interface PoolOptions {
  /** Called for each failed item as soon as it fails */
  onError?: (error: unknown, index: number) => void;
}

/**
 * Run `worker` over every item with at most `poolSize` calls in flight.
 * All items run to completion; results keep input order. If any item
 * failed, the first failure is rethrown once the pool has drained.
 */
export async function mapPooled<T, R>(
  items: readonly T[],
  poolSize: number,
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {},
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  const queue = items.map((item, index) => ({ item, index }));

  const workers = Array.from(
    { length: Math.min(Math.max(1, poolSize), items.length) },
    async () => {
      for (let entry = queue.shift(); entry; entry = queue.shift()) {
        try {
          results[entry.index] = await worker(entry.item, entry.index);
        } catch (error) {
          failures.push(error);
          options.onError?.(error, entry.index);
        }
      }
    },
  );

  await Promise.all(workers);

  if (failures.length > 0) {
    throw failures[0];
  }

  return results;
}

/**
 * Like mapPooled, dropping null and undefined results
 */
export async function filterPooled<T, R>(
  items: readonly T[],
  poolSize: number,
  worker: (item: T, index: number) => Promise<R | null | undefined>,
  options: PoolOptions = {},
): Promise<R[]> {
  const results = await mapPooled(items, poolSize, worker, options);
  return results.filter((result): result is R => result !== null && result !== undefined);
}
