/**
 * Run `worker` over `items` with at most `limit` in flight. Once `signal`
 * aborts no further item is started; items already running finish on their
 * own terms. Resolves to the indices of items that never started.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<number[]> {
  let next = 0;
  const lanes = Math.max(1, Math.min(Math.floor(limit), items.length));

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      await worker(item, index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => lane()));

  const notStarted: number[] = [];
  for (let i = next; i < items.length; i++) notStarted.push(i);
  return notStarted;
}
