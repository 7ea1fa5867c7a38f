/**
 * In-process locks serializing ID index read-modify-write per table
 */

/**
 * Simple FIFO mutex
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  get locked(): boolean {
    return this.#locked;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * One mutex per table name, created on first use.
 * Share an instance between repositories to serialize their index updates.
 */
export class TableLocks {
  #mutexes = new Map<string, Mutex>();

  /**
   * Get or create the mutex for a table
   */
  for(table: string): Mutex {
    let mutex = this.#mutexes.get(table);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(table, mutex);
    }
    return mutex;
  }

  async withTable<T>(table: string, fn: () => Promise<T>): Promise<T> {
    return this.for(table).withLock(fn);
  }
}
