// Bounded worker pool and per-key serialization for indexing work.

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * Results keep the input order. A rejected item rejects the whole call, so
 * workers that must not abort the batch catch their own errors.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new TypeError('Expected `concurrency` to be an integer from 1 and up');
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const drain = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await worker(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(workers);
  return results;
}

/**
 * Serializes async sections that share a key (one writer per document);
 * different keys run concurrently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a section running or queued. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
