/**
 * Run an async worker function over items with limited concurrency.
 *
 * Workers pull the next item as soon as they finish the previous one. After the
 * first worker rejection no new items are started, but the returned promise
 * only settles once every running worker has finished; it then rejects with
 * that first error.
 *
 * @param items - Items to process
 * @param limit - Maximum concurrent workers (values below 1 are treated as 1)
 * @param worker - Async function to run for each item, with its position
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const state: { failure?: { error: unknown } } = {};
  const runnerCount = Math.min(Math.max(1, Math.floor(limit)), Math.max(1, items.length));

  const runners = Array.from({ length: runnerCount }, async () => {
    while (!state.failure && next < items.length) {
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  });

  await Promise.all(runners);
  if (state.failure) throw state.failure.error;
}
