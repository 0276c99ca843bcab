/**
 * Async reader/writer lock. Readers share, writers are exclusive, and
 * waiters are granted strictly in arrival order so writers cannot starve.
 */

export type Release = () => void;

interface Waiter {
  mode: "read" | "write";
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  /** Number of holders plus waiters; zero means idle. */
  get pending(): number {
    return this.readers + (this.writing ? 1 : 0) + this.waiters.length;
  }

  acquireRead(): Promise<Release> {
    if (!this.writing && this.waiters.length === 0) {
      this.readers++;
      return Promise.resolve(this.releaser("read"));
    }
    return this.wait("read");
  }

  acquireWrite(): Promise<Release> {
    if (!this.writing && this.readers === 0 && this.waiters.length === 0) {
      this.writing = true;
      return Promise.resolve(this.releaser("write"));
    }
    return this.wait("write");
  }

  async withRead<T>(task: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await task();
    } finally {
      release();
    }
  }

  async withWrite<T>(task: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private wait(mode: Waiter["mode"]): Promise<Release> {
    return new Promise<Release>((resolve) => {
      this.waiters.push({
        mode,
        grant: () => resolve(this.releaser(mode)),
      });
    });
  }

  private releaser(mode: Waiter["mode"]): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === "write") this.writing = false;
      else this.readers--;
      this.drain();
    };
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (next.mode === "write") {
        if (this.writing || this.readers > 0) return;
        this.waiters.shift();
        this.writing = true;
        next.grant();
        return;
      }
      if (this.writing) return;
      this.waiters.shift();
      this.readers++;
      next.grant();
    }
  }
}
