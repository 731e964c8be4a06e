/** Promise-chain mutex: callers run one at a time in arrival order. */
export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(fn, fn);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/**
 * One AsyncMutex per key, created on demand and dropped when its queue
 * drains. Different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: AsyncMutex; pending: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new AsyncMutex(), pending: 0 };
      this.locks.set(key, entry);
    }
    entry.pending += 1;
    const held = entry;
    try {
      return await held.mutex.runExclusive(fn);
    } finally {
      held.pending -= 1;
      if (held.pending === 0 && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    }
  }

  /** Keys with queued or running work. */
  get size(): number {
    return this.locks.size;
  }
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep the
 * input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
  return results;
}
