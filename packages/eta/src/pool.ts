/**
 * Run worker over items with at most `concurrency` calls in flight.
 * Resolves once every item has been processed. Worker rejections propagate,
 * so callers that must not fail wrap their own errors.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  let next = 0;

  const lane = async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  };

  const lanes = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: lanes }, () => lane()));
}
