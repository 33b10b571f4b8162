export class Mutex {
  private queue: (() => void)[] = [];
  private isLocked = false;

  get locked() {
    return this.isLocked;
  }

  get waiting() {
    return this.queue.length;
  }

  /**
   * Resolves once the lock is held. Waiters are served in arrival order;
   * a waiter whose signal aborts leaves the queue and rejects with the
   * signal's reason.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const run = () => {
        signal?.removeEventListener("abort", onAbort);
        this.isLocked = true;
        resolve();
      };

      const onAbort = () => {
        const idx = this.queue.indexOf(run);
        if (idx !== -1) this.queue.splice(idx, 1);
        reject(signal?.reason);
      };

      if (!this.isLocked) {
        run();
      } else {
        signal?.addEventListener("abort", onAbort, { once: true });
        this.queue.push(run);
      }
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.isLocked = false;
    }
  }
}
