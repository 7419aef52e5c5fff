/**
 * Map items through an async worker with at most `concurrency` calls in
 * flight. Results are returned in input order. The first rejection rejects
 * the call immediately; the other workers keep taking items until the list
 * is exhausted, and their results are discarded.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  // One iterator shared by every worker hands out each item exactly once
  const entries = items.entries();

  const runWorker = async (): Promise<void> => {
    for (const [index, item] of entries) {
      results[index] = await worker(item, index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < limit; i++) {
    workers.push(runWorker());
  }
  await Promise.all(workers);

  return results;
}
