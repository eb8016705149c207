/**
 * Bounded concurrency
 *
 * Items run in consecutive groups of at most maxConcurrent, each group
 * settled with Promise.allSettled before the next starts.
 *
 * @module utils/concurrency
 */

/**
 * Apply `fn` to every item, at most `maxConcurrent` at a time.
 * Results are aligned with the input by index, not by completion order.
 */
export async function settleInGroups<T, R>(
  items: readonly T[],
  maxConcurrent: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const groupSize = Math.max(1, Math.floor(maxConcurrent));
  const results: PromiseSettledResult<R>[] = [];

  for (let start = 0; start < items.length; start += groupSize) {
    const group = items.slice(start, start + groupSize);
    const settled = await Promise.allSettled(group.map((item, offset) => fn(item, start + offset)));
    results.push(...settled);
  }
  return results;
}
