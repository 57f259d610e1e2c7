/**
 * Map over items with at most `limit` workers in flight.
 *
 * Results come back in input order whatever the completion order. Workers
 * should contain their own record-level errors: a rejection fails the whole
 * call once in-flight work settles.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.entries();
  const workerCount = Math.min(Math.max(1, Math.floor(limit)), items.length);

  const runners = Array.from({ length: workerCount }, async () => {
    // Runners share one iterator, so each item is taken exactly once
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  });

  const settled = await Promise.allSettled(runners);
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }

  return results;
}
