/**
 * Runs independent work units with at most `concurrency` in flight and
 * returns their results in input order.
 */
export async function runWorkUnits<T, R>(
  units: readonly T[],
  concurrency: number,
  worker: (unit: T, index: number) => R | Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(units.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency), units.length));
  let cursor = 0;

  async function drain(): Promise<void> {
    while (cursor < units.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await worker(units[index], index);
      // yield between units so long batches do not starve the event loop
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  const runners: Promise<void>[] = [];
  for (let i = 0; i < limit; i += 1) {
    runners.push(drain());
  }
  await Promise.all(runners);
  return results;
}
