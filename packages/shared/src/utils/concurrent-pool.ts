/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Keeps up to N workers busy; a worker that finishes an item immediately
 * takes the next one from the shared queue.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Results keep the original item order. Once `abortSignal` fires, workers
   * finish their current item and take no new ones; the slots of items that
   * were never started stay `undefined`.
   *
   * @param items - Items to process
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param processFn - Async function to process each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @param abortSignal - Stops workers from picking up further items
   * @returns Results in the same order as the input items
   */
  static async run<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
    abortSignal?: AbortSignal,
  ): Promise<Array<R | undefined>> {
    const results: Array<R | undefined> = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !abortSignal?.aborted) {
        const index = nextIndex++;
        const result = await processFn(items[index], index);
        results[index] = result;
        onItemComplete?.(result, index);
      }
    }

    const workerCount = Math.min(Math.max(1, concurrency), items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }
}
