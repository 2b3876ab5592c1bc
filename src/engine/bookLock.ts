/**
 * Exclusive lock for one symbol's book.
 *
 * Callers queue behind a promise chain: each `runExclusive` starts only after
 * every earlier holder has settled. A holder that throws releases the lock
 * like any other; its error goes back to its own caller only.
 */
export class BookLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  private release(): void {
    this.waiting--;
  }
}
