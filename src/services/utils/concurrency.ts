/**
 * Maps `items` through `worker` with at most `concurrency` calls in flight.
 * Results land in input order regardless of completion order. A rejection
 * from `worker` rejects the whole map, so workers that must not fail should
 * return a Result instead of throwing.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const poolSize = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let nextIndex = 0;

  const runLane = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes: Promise<void>[] = [];
  for (let lane = 0; lane < poolSize; lane += 1) {
    lanes.push(runLane());
  }
  await Promise.all(lanes);

  return results;
}
