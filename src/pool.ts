export type PoolTaskResult<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown }
  | { status: "skipped" };

export type PoolOptions = {
  concurrency: number;
  signal?: AbortSignal;
};

/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight. Results
 * keep the input order and are only returned once every started task has
 * settled. Items not yet started when `signal` aborts are reported as skipped.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolTaskResult<R>[]> {
  const results: PoolTaskResult<R>[] = items.map(() => ({ status: "skipped" }));
  const concurrency = Math.max(1, Math.min(options.concurrency, items.length));

  let next = 0;
  const workers = Array.from({ length: concurrency }, async () => {
    while (next < items.length) {
      if (options.signal?.aborted) return;
      const index = next;
      next += 1;
      try {
        results[index] = { status: "fulfilled", value: await task(items[index], index) };
      }
      catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  });

  await Promise.allSettled(workers);
  return results;
}
