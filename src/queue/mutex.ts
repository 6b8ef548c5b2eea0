/**
 * Promise-chain mutex. Callers are granted the lock in the order they asked
 * for it; a task that throws still releases it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}
