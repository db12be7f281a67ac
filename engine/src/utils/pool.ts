/**
 * Run `task` over `items` with at most `concurrency` calls in flight.
 *
 * Workers pull items from a shared cursor in order, so a slow item only
 * holds up its own worker. `task` must not reject; callers capture their
 * own errors.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      await task(items[index], index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
}
