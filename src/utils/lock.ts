/**
 * Async locks for in-memory stores.
 *
 * Handlers and the scheduler tick interleave on the event loop, so any
 * read-modify-write that spans an `await` goes through one of these.
 */

export class Mutex {
  private chain: Promise<void> = Promise.resolve();

  run<T>(fn: () => T | Promise<T>): Promise<T> {
    const next = this.chain.then(fn, fn);
    this.chain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}

interface Waiter {
  write: boolean;
  grant: () => void;
}

/**
 * Reader/writer lock: any number of concurrent readers, or one writer.
 * Waiters are granted in arrival order, so a queued writer blocks later readers.
 */
export class RwLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.release(false);
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.release(true);
    }
  }

  private canGrant(write: boolean): boolean {
    if (this.writing) return false;
    return write ? this.readers === 0 : true;
  }

  private acquire(write: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(write)) {
      this.take(write);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ write, grant: resolve });
    });
  }

  private take(write: boolean): void {
    if (write) this.writing = true;
    else this.readers++;
  }

  private release(write: boolean): void {
    if (write) this.writing = false;
    else this.readers--;

    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!this.canGrant(head.write)) break;
      this.queue.shift();
      this.take(head.write);
      head.grant();
      if (head.write) break;
    }
  }
}
