/**
 * Promise-chain lock. Callers run one at a time in arrival order; a rejected
 * callback rejects only its own caller and releases the lock for the next.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
