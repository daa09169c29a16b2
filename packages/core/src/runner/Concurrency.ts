/**
 * Map over `items` with at most `limit` calls in flight. Results keep the
 * order of `items`; completion order is not defined.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const bounded = Number.isFinite(limit) ? Math.floor(limit) : 1;
  const workerCount = Math.max(1, Math.min(bounded, items.length));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await fn(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
