/**
 * Per-instrument serialization for async hosts.
 *
 * The engine itself is synchronous; callers that reach it from concurrent
 * request handlers queue their work here so calls on one instrument run one
 * at a time, in arrival order. A rejected call does not stall the queue.
 */
export class InstrumentLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const next = prev.then(fn, fn); // Always run even if prev failed
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return next;
  }

  /** Number of instruments with queued work. */
  get pending(): number {
    return this.tails.size;
  }
}
