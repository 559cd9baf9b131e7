/**
 * Per-session mutual exclusion. Turns and the idle sweep run under the same lock,
 * so the sweep never closes a session mid-turn.
 */

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();

  /** Run `fn` once every earlier holder has finished. Waiters run in FIFO order. */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(() => fn());
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
