export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Once a worker throws, no slot
 * takes another item; the first error is rethrown after the in-flight items settle.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  const failure: { failed: boolean; error?: unknown } = { failed: false };
  const slots = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (!failure.failed && index < items.length) {
      const current = index;
      index += 1;
      try {
        await worker(items[current], current);
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
        }
      }
    }
  });
  await Promise.all(slots);
  if (failure.failed) {
    throw failure.error;
  }
}
