/**
 * Bounded fan-out over an index-addressed array.
 *
 * At most `limit` tasks run at once; results keep input order. The first failure
 * aborts the shared signal (so in-flight tasks can stop early), no further task is
 * started, and once every started task has settled the first failure is rethrown.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (limit < 1) throw new RangeError(`mapConcurrent: limit must be >= 1 (got ${limit})`);

  const controller = new AbortController();
  const onOuterAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) controller.abort(signal.reason);
  else signal?.addEventListener('abort', onOuterAbort, { once: true });

  const results = new Array<R>(items.length);
  const queue = items.entries();
  let failed = false;
  let firstError: unknown;

  async function worker(): Promise<void> {
    while (!failed && !controller.signal.aborted) {
      const step = queue.next();
      if (step.done) return;
      const [index, item] = step.value;
      try {
        results[index] = await fn(item, index, controller.signal);
      } catch (err) {
        if (!failed) {
          failed = true;
          firstError = err;
          controller.abort(err);
        }
      }
    }
  }

  try {
    await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => worker()));
  } finally {
    signal?.removeEventListener('abort', onOuterAbort);
  }

  if (failed) throw firstError;
  signal?.throwIfAborted();
  return results;
}
