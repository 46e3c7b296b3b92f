// Per-key exclusive sections and a scope-wide read/write gate.

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  // FIFO per key: callers run in the order they asked for the lock.
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.tails.set(key, tail);
    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

// Ingestion enters shared; a handicap pass enters exclusive. A waiting
// exclusive caller blocks new shared entries, so a pass cannot starve.
export class ScopeGate {
  private active = 0;
  private writer = false;
  private waitingWriters: Array<() => void> = [];
  private waitingReaders: Array<() => void> = [];
  private gen = 0;

  // Bumped after every committed exclusive section.
  get generation(): number {
    return this.gen;
  }

  get pending(): { shared: number; exclusive: number } {
    return { shared: this.waitingReaders.length, exclusive: this.waitingWriters.length };
  }

  async shared<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireShared();
    try {
      return await fn();
    } finally {
      this.releaseShared();
    }
  }

  async exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireExclusive();
    try {
      const out = await fn();
      this.gen++;
      return out;
    } finally {
      this.releaseExclusive();
    }
  }

  private acquireShared(): Promise<void> {
    if (!this.writer && this.waitingWriters.length === 0) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waitingReaders.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private releaseShared(): void {
    this.active--;
    if (this.active === 0) this.wakeWriter();
  }

  private acquireExclusive(): Promise<void> {
    if (!this.writer && this.active === 0 && this.waitingWriters.length === 0) {
      this.writer = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waitingWriters.push(() => {
        this.writer = true;
        resolve();
      });
    });
  }

  private releaseExclusive(): void {
    this.writer = false;
    if (this.waitingWriters.length > 0) {
      this.wakeWriter();
      return;
    }
    const readers = this.waitingReaders.splice(0);
    for (const wake of readers) wake();
  }

  private wakeWriter(): void {
    if (this.writer || this.active > 0) return;
    const next = this.waitingWriters.shift();
    if (next) next();
  }
}
