/**
 * Runs submitted tasks one at a time in submission order. A task that throws
 * rejects only its own promise; later tasks still run.
 */
export class Mailbox {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const next = this.tail.then(task);
    this.tail = next.then(
      () => { this.pending--; },
      () => { this.pending--; },
    );
    return next;
  }

  get size(): number {
    return this.pending;
  }

  /** Resolves once everything submitted so far has run. */
  drain(): Promise<void> {
    return this.tail.then(() => undefined);
  }
}
