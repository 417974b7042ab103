/**
 * Serialises async tasks per key. Tasks for different keys run freely;
 * tasks for the same key run one at a time in call order.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const release = () => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    const tail: Promise<void> = result.then(release, release);
    this.tails.set(key, tail);
    return result;
  }

  /** Number of keys with queued or running tasks */
  get size(): number {
    return this.tails.size;
  }
}
