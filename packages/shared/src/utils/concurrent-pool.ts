export interface ConcurrentPoolOptions<R> {
  /** Called once per finished item, in completion order */
  onItemComplete?: (result: R, index: number) => void;

  /**
   * Stops workers from taking further items. Work already handed to the
   * process function is not interrupted; that function observes the signal
   * itself if it needs to.
   */
  abortSignal?: AbortSignal;
}

/**
 * Bounded worker pool.
 *
 * All workers share one iterator over the input, so a worker that
 * finishes early takes the next pending item straight away instead of
 * waiting for a whole batch to drain.
 */
export class ConcurrentPool {
  /**
   * Run `processFn` over `items` with at most `concurrency` calls in flight.
   *
   * The returned array is indexed like `items`. Slots of items that were
   * never started because `abortSignal` fired stay `undefined`. The first
   * rejection from `processFn` rejects the whole run.
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options: ConcurrentPoolOptions<R> = {},
  ): Promise<Array<R | undefined>> {
    const { onItemComplete, abortSignal } = options;
    const results = Array.from<R | undefined>({ length: items.length });
    const pending = items.entries();

    const drain = async (): Promise<void> => {
      while (!abortSignal?.aborted) {
        const next = pending.next();
        if (next.done) {
          return;
        }
        const [index, item] = next.value;
        const result = await processFn(item, index);
        results[index] = result;
        onItemComplete?.(result, index);
      }
    };

    const workerCount = Math.max(0, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, drain));
    return results;
  }
}
