// Async locking primitives for state shared between concurrent message handlers

type Release = () => void;

function once(fn: () => void): Release {
  let released = false;
  return () => {
    if (released) return;
    released = true;
    fn();
  };
}

/**
 * Counting semaphore. Waiters are served in FIFO order and a released
 * permit is handed straight to the next waiter.
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  /** Acquire a permit. Returns a release function (idempotent). */
  async acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return once(() => this.release());
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get pending(): number {
    return this.waiters.length;
  }

  get inUse(): number {
    return this.permits - this.available;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }
}

/** Mutual exclusion guard. */
export class Mutex extends Semaphore {
  constructor() {
    super(1);
  }

  get isLocked(): boolean {
    return this.inUse > 0;
  }
}

/**
 * Multiple-reader / single-writer lock.
 *
 * Readers share the lock while no writer holds or waits for it; a queued
 * writer blocks new readers so it cannot starve. When a writer releases,
 * the next queued writer wins, otherwise every queued reader is admitted.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  async acquireRead(): Promise<Release> {
    if (!this.writing && this.writeQueue.length === 0) {
      this.readers++;
    } else {
      await new Promise<void>((resolve) => this.readQueue.push(resolve));
    }
    return once(() => this.releaseRead());
  }

  async acquireWrite(): Promise<Release> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
    } else {
      await new Promise<void>((resolve) => this.writeQueue.push(resolve));
    }
    return once(() => this.releaseWrite());
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  private releaseRead(): void {
    this.readers--;
    if (this.readers === 0) this.grantNext();
  }

  private releaseWrite(): void {
    this.writing = false;
    this.grantNext();
  }

  private grantNext(): void {
    const writer = this.writeQueue.shift();
    if (writer) {
      this.writing = true;
      writer();
      return;
    }

    const readers = this.readQueue.splice(0);
    this.readers += readers.length;
    for (const reader of readers) reader();
  }
}
