/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Lanes pull
 * the next index as they free up, so one slow item only holds its own lane.
 * Resolves once every call has settled; the worker is expected not to throw.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lanes = Math.min(Math.max(1, Math.floor(limit)), items.length);
  const lane = async () => {
    while (next < items.length) {
      const i = next++;
      await worker(items[i], i);
    }
  };
  await Promise.all(Array.from({ length: lanes }, lane));
}
