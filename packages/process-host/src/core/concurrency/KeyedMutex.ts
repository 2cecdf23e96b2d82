/**
 * Per-key FIFO serialization of async tasks.
 *
 * Tasks for the same key run one after another in call order; tasks for
 * different keys never wait on each other. A failing task does not block
 * the ones queued behind it.
 */
export class KeyedMutex<K = string> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Whether a task for the key is running or queued. */
  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
