type Mode = "read" | "write";

interface Waiter {
  mode: Mode;
  grant: () => void;
}

/**
 * FIFO read/write lock. Readers share the lock; a writer holds it alone.
 * A queued writer blocks readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  private canEnter(mode: Mode): boolean {
    return mode === "read" ? !this.writing : !this.writing && this.readers === 0;
  }

  private enter(mode: Mode): void {
    if (mode === "read") this.readers++;
    else this.writing = true;
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.queue.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve });
    });
  }

  private release(mode: Mode): void {
    if (mode === "read") this.readers--;
    else this.writing = false;

    let next = this.queue[0];
    while (next && this.canEnter(next.mode)) {
      this.queue.shift();
      this.enter(next.mode);
      next.grant();
      next = this.queue[0];
    }
  }
}
