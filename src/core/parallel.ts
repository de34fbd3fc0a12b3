/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight and
 * keeps results in input order. Once `signal` aborts, no new item is started
 * and the call rejects with the abort reason after in-flight work settles.
 */
export async function mapLimit<T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (concurrency < 1) {
    throw new Error('concurrency must be >= 1');
  }
  signal?.throwIfAborted();

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function run(): Promise<void> {
    while (!signal?.aborted) {
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) {
        return;
      }
      results[current] = await worker(items[current], current);
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => run());
  await Promise.all(workers);
  signal?.throwIfAborted();
  return results;
}
