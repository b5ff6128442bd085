type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Promise-based read/write lock.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are granted strictly in arrival order, so a queued writer is not
 * starved by readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.queue.length;
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  private canGrant(mode: LockMode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  // State changes happen synchronously at grant time, before the waiter resumes
  private take(mode: LockMode): void {
    if (mode === 'read') this.readers++;
    else this.writing = true;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') this.readers--;
    else this.writing = false;
    this.drain();
  }

  private drain(): void {
    let next = this.queue[0];
    while (next && this.canGrant(next.mode)) {
      this.queue.shift();
      this.take(next.mode);
      next.grant();
      next = this.queue[0];
    }
  }
}
