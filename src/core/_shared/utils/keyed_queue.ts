/**
 * Runs tasks one at a time per key. Tasks for different keys do not wait on each other.
 */
export class KeyedWriteQueue {
  private readonly tails = new Map<string, Promise<void>>();

  enqueue<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return next;
  }

  flush(key: string): Promise<void> {
    return this.tails.get(key) ?? Promise.resolve();
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
