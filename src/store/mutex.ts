/**
 * FIFO async lock serializing read-modify-write sections of a store
 */
export class Mutex {
  private held = false;
  private readonly queue: Array<() => void> = [];

  /**
   * Resolves with a release function once the lock is held.
   * Releasing twice is a no-op.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      let released = false;
      const release = () => {
        if (released) return;
        released = true;

        const next = this.queue.shift();
        if (next) next();
        else this.held = false;
      };

      if (this.held) {
        this.queue.push(() => resolve(release));
        return;
      }
      this.held = true;
      resolve(release);
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
