/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order. A rejecting worker rejects the whole run.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      const index: number = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes: number = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, drain));
  return results;
}
