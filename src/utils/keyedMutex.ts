/**
 * Per-key promise chain. Tasks sharing a key run one after another; different keys
 * never wait on each other.
 */
type Task<T> = () => Promise<T>;

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: Task<T>): Promise<T> {
    const current = this.tails.get(key) ?? Promise.resolve();
    const next = current.then(task);

    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    // Drop the entry once nothing else queued behind this task.
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return next;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
