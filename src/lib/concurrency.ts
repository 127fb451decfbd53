/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Workers pull the next item from a shared cursor, so a slow item never holds
 * up a whole batch. The first rejection stops further items from starting and
 * is rethrown once the running workers settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let cursor = 0;
  const failures: unknown[] = [];

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length && failures.length === 0 && !signal?.aborted) {
      const index = cursor++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, runWorker));

  if (failures.length > 0) throw failures[0];
  signal?.throwIfAborted();
  return results;
}
