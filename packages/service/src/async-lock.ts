/**
 * Promise-chain mutex. Each `runExclusive` call waits for the previous
 * holder, runs `fn`, and releases in `finally` whatever `fn` does.
 *
 * Keep critical sections short: never await a delay, an inner service call
 * or a user provider while holding the lock.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;

    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      release();
    }
  }
}
