/**
 * Bounded fan-out for TLD scans.
 *
 * A fixed number of workers pull the next index from a shared cursor, so at
 * most `limit` lookups are in flight against DNS resolvers and RDAP servers.
 */

function assertConcurrencyLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }
}

/**
 * Map items through an async function with at most `limit` calls pending.
 * Results keep the order of `items`. The first rejection rejects the whole map;
 * workers still running finish their current item but take no new ones.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  assertConcurrencyLimit(limit);

  const results: R[] = [];
  let cursor = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, worker));
  return results;
}
