/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  // one iterator shared by every lane, so each item is taken exactly once
  const queue = items.entries();

  const runLane = async (): Promise<void> => {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  };

  const width = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: width }, runLane));
  return results;
}
