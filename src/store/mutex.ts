/**
 * FIFO async mutex. `acquire()` resolves with a release function once the
 * caller holds the lock.
 */
export class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      let released = false;
      const release = (): void => {
        if (released) {
          return;
        }
        released = true;
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }

  get isLocked(): boolean {
    return this.locked;
  }
}
