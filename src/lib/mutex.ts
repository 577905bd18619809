/**
 * Promise-chained mutual exclusion. Callers queue in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {};
    const held = new Promise<void>(resolve => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => held);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
