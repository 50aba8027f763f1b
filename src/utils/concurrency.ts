/**
 * Bounded-concurrency pool: processes items with at most `limit` in flight.
 * Each item settles independently; a rejection does not stop the others.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array<PromiseSettledResult<R>>(
    items.length
  );
  // Workers share one iterator, so each entry is taken exactly once
  const queue = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      try {
        results[index] = {
          status: "fulfilled",
          value: await processor(item, index),
        };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

/**
 * Split items into consecutive batches of `size`
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batchSize = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}
