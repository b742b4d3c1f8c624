/**
 * FIFO mutual exclusion per key. Unrelated keys never wait on each other.
 */
export class KeyedLease {
  private readonly tails = new Map<string, Promise<void>>();

  /** Resolves once every earlier holder of `key` has released; returns the release function */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /** Run `task` while holding the lease for `key` */
  async withLease<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }
}
