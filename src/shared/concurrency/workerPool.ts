export type SettledItem<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; reason: unknown };

/**
 * Runs `task` over `items` with at most `concurrency` in flight. Results keep
 * input order regardless of completion order; a rejected task never stops its
 * siblings. `onSettled` fires once per item in completion order.
 */
export const mapWithConcurrency = async <TItem, TResult>(
  items: readonly TItem[],
  concurrency: number,
  task: (item: TItem, index: number) => Promise<TResult>,
  onSettled?: (settled: SettledItem<TResult>, index: number) => void,
): Promise<Array<SettledItem<TResult>>> => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Worker pool concurrency must be a positive integer, got ${concurrency}.`);
  }

  const results = new Array<SettledItem<TResult>>(items.length);
  // Shared iterator: each worker pulls the next unclaimed entry.
  const pending = items.entries();

  const runWorker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      let settled: SettledItem<TResult>;
      try {
        settled = { status: "fulfilled", value: await task(item, index) };
      } catch (reason) {
        settled = { status: "rejected", reason };
      }

      results[index] = settled;
      onSettled?.(settled, index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));

  return results;
};
