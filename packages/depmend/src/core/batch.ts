import { throwIfCancelled } from "./timeout.js";

/**
 * Map items with controlled concurrency using a simple batching approach.
 * Results keep the input order. Stops between batches once the run is cancelled.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = [];

  for (let i = 0; i < items.length; i += concurrency) {
    throwIfCancelled(signal);
    const batch = items.slice(i, i + concurrency);
    const batchResults = await Promise.all(batch.map((item) => fn(item)));
    results.push(...batchResults);
  }

  return results;
}
