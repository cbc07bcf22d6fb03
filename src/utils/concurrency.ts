/**
 * Bounded concurrency helpers
 */

/**
 * Split `items` into consecutive chunks of at most `size` elements
 *
 * @example
 * ```typescript
 * chunk([1, 2, 3, 4, 5], 2);
 * // => [[1, 2], [3, 4], [5]]
 * ```
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

/**
 * Apply `worker` to every item with at most `limit` calls in flight.
 * The first rejection rejects the whole call once running workers have
 * settled; workers that should not fail the batch must catch their own errors.
 *
 * @param shouldContinue - Checked before each item is started; returning
 *   false stops picking up new items (already started ones finish)
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  shouldContinue: () => boolean = () => true
): Promise<void> {
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length && shouldContinue()) {
      const index = next++;
      await worker(items[index], index);
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(limit), items.length));
  const settled = await Promise.allSettled(Array.from({ length: lanes }, () => run()));
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }
}
