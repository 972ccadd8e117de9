// Runs `worker` over `items` with at most `concurrency` in flight.
// After the first failure no new item starts; in-flight items finish, then the first error is thrown.
export async function runBounded<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  const limit = Math.max(1, Math.floor(concurrency));
  const failures: unknown[] = [];
  let nextIndex = 0;

  const lane = async (): Promise<void> => {
    while (failures.length === 0 && nextIndex < items.length) {
      const item = items[nextIndex];
      nextIndex += 1;
      if (item === undefined) {
        continue;
      }
      try {
        await worker(item);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => lane()));
  if (failures.length > 0) {
    throw failures[0];
  }
}
