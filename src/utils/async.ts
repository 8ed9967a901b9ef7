/**
 * Async helpers: timeouts and bounded concurrency
 */

/**
 * Reject with `createError()` when the promise does not settle within `ms`
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  createError: () => Error
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(createError());
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map items with at most `concurrency` calls in flight.
 * Results keep the order of `items`; completion order is not guaranteed.
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results = new Array<U>(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}
