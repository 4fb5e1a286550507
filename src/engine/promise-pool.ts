/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Runners pull from a shared cursor, so completion order is unspecified;
 * callers that need ordered results write them by index.
 */
export const runWithConcurrency = async <T>(
  items: ReadonlyArray<T>,
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> => {
  const limit = Math.max(1, Math.floor(Number.isFinite(concurrency) ? concurrency : 1));
  const runnerCount = Math.min(limit, items.length);
  let cursor = 0;

  const runners = Array.from({ length: runnerCount }, async (): Promise<void> => {
    while (true) {
      const current = cursor;

      cursor += 1;

      if (current >= items.length) {
        return;
      }

      const item = items[current];

      if (item === undefined) {
        continue;
      }

      await worker(item, current);
    }
  });

  await Promise.all(runners);
};
