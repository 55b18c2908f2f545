/**
 * Runs `worker` over `items` with at most `size` calls in flight.
 * A rejected call does not stop the others; results come back in input order
 * once every item has settled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  let nextIndex = 0;

  const drain = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(size, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => drain()));
  return results;
}
