/**
 * Operation Lock
 *
 * Invariant: at most one public operation executes at a time, end to end.
 * Waiters are admitted strictly in arrival order.
 */

interface Waiter {
  label: string;
  resolve: () => void;
}

export class OperationLock {
  private holder: string | null = null;
  private queue: Waiter[] = [];

  async acquire(label: string): Promise<void> {
    if (this.holder === null) {
      this.holder = label;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push({ label, resolve });
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      this.holder = next.label;
      next.resolve();
    } else {
      this.holder = null;
    }
  }

  /**
   * Run `work` while holding the lock. Released on success and on error.
   */
  async runExclusive<T>(label: string, work: () => Promise<T>): Promise<T> {
    await this.acquire(label);
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  // For testing: check if lock is held
  isLocked(): boolean {
    return this.holder !== null;
  }

  // For testing: number of waiting operations
  queueLength(): number {
    return this.queue.length;
  }
}
