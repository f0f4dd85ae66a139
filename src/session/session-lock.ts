/**
 * Session-keyed exclusive sections.
 *
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys never wait on each other. A failed task does not block the
 * ones queued behind it.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The queue only needs to know when the task settled, not how
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  /** Keys with a running or queued task (for metrics/debugging) */
  get size(): number {
    return this.tails.size;
  }
}
