export interface ConcurrentResult<R> {
  index: number;
  status: "fulfilled" | "rejected" | "skipped";
  value?: R;
  error?: unknown;
}

// Results keep the input index so callers can attribute each one after completion order shuffles.
export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<ConcurrentResult<R>[]> {
  const results: ConcurrentResult<R>[] = items.map((_, index) => ({ index, status: "skipped" }));
  const poolSize = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let cursor = 0;

  const runNext = async (): Promise<void> => {
    while (cursor < items.length) {
      if (signal?.aborted) {
        return;
      }
      const index = cursor;
      cursor += 1;
      try {
        results[index] = { index, status: "fulfilled", value: await worker(items[index], index) };
      } catch (error) {
        results[index] = { index, status: "rejected", error };
      }
    }
  };

  const runners: Promise<void>[] = [];
  for (let slot = 0; slot < poolSize; slot += 1) {
    runners.push(runNext());
  }
  await Promise.all(runners);
  return results;
}
