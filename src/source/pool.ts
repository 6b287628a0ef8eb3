export const MAX_POOL_CONCURRENCY = 8;

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * Each worker writes only its own slot (`results[i]` for `items[i]`), so the
 * result order matches the input order no matter which task finishes first.
 * Resolves once every item has produced a result; workers are expected to
 * turn their own failures (and cancellation) into values rather than throw.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const limit = Math.max(1, Math.min(MAX_POOL_CONCURRENCY, Math.floor(concurrency)));
  const slots = new Array<R>(items.length);
  let cursor = 0;

  const runners: Promise<void>[] = [];
  for (let i = 0; i < Math.min(limit, items.length); i++) {
    runners.push(
      (async () => {
        while (cursor < items.length) {
          const index = cursor++;
          const item = items[index];
          if (item === undefined) continue;
          slots[index] = await worker(item, index);
        }
      })(),
    );
  }

  await Promise.all(runners);
  return slots;
}
