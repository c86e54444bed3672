/**
 * Bounded-parallelism helpers
 */

/**
 * Resolve after `ms` milliseconds; resolves immediately for ms <= 0
 */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Map `items` through `worker` with at most `limit` calls in flight.
 *
 * Each of the `min(limit, items.length)` workers pulls the next unclaimed
 * index until the list is exhausted, so excess items queue instead of
 * starting at once. Results keep the input order. A rejection from
 * `worker` rejects the whole call; callers that must not fail wrap their
 * own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await worker(item, index);
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => run());
  await Promise.all(workers);

  return results;
}
