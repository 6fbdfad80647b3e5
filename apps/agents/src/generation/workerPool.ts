export interface WorkerPoolOptions {
  concurrency: number;
}

/**
 * Drains `items` with at most `concurrency` workers and returns the results in
 * input order. Each worker pulls the next item from a shared queue as soon as
 * it finishes the previous one. The first rejection stops further pulls and is
 * rethrown once the in-flight items have settled.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions
): Promise<R[]> {
  const concurrency = Math.max(1, Math.min(Math.floor(options.concurrency), items.length || 1));
  const settled: Array<{ value: R }> = [];
  const state: { nextIndex: number; failure?: { error: unknown } } = { nextIndex: 0 };

  async function drain() {
    while (!state.failure && state.nextIndex < items.length) {
      const index = state.nextIndex;
      state.nextIndex += 1;
      try {
        settled[index] = { value: await worker(items[index], index) };
      } catch (error) {
        state.failure ??= { error };
      }
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => drain()));

  if (state.failure) {
    throw state.failure.error;
  }

  return items.map((_, index) => {
    const entry = settled[index];
    if (!entry) {
      throw new Error(`Missing worker result at index ${index}.`);
    }
    return entry.value;
  });
}
