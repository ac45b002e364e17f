/**
 * Bounded worker pool over a fixed item list.
 *
 * At most `limit` workers pull items in order from a shared cursor. Once
 * `signal` aborts, no further item is started; items already running are
 * left to finish (or to notice the signal themselves). The items that were
 * never started are returned so the caller can account for them.
 *
 * `worker` is expected to handle its own errors; a rejection aborts the pool.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<{ notStarted: T[] }> {
  let nextIndex = 0;

  const laneCount = Math.max(1, Math.min(limit, items.length));

  const lanes = Array.from({ length: laneCount }, async () => {
    while (nextIndex < items.length) {
      if (signal?.aborted) return;
      const index = nextIndex++;
      await worker(items[index], index);
    }
  });

  await Promise.all(lanes);
  return { notStarted: items.slice(nextIndex) };
}
