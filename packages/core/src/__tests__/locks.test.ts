import { describe, it, expect } from "vitest";
import { Mutex, ReadWriteLock, Semaphore } from "../locks";

const tick = () => new Promise((r) => setTimeout(r, 5));

describe("Mutex", () => {
  it("should acquire and release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);

    release();
    expect(mutex.isLocked).toBe(false);
  });

  it("should serialize critical sections in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = mutex.runExclusive(async () => {
      order.push("a:start");
      await tick();
      order.push("a:end");
    });
    const second = mutex.runExclusive(() => {
      order.push("b");
    });

    await Promise.all([first, second]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
  });

  it("should release when the critical section throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(mutex.isLocked).toBe(false);
  });

  it("should ignore a second call to the same release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();
    const releaseSecond = await waiting;

    expect(mutex.isLocked).toBe(true);
    releaseSecond();
    expect(mutex.isLocked).toBe(false);
  });
});

describe("Semaphore", () => {
  it("should admit up to the permit count", async () => {
    const sem = new Semaphore(2);
    const r1 = await sem.acquire();
    await sem.acquire();

    let third = false;
    const p3 = sem.acquire().then((release) => {
      third = true;
      return release;
    });

    await tick();
    expect(third).toBe(false);
    expect(sem.pending).toBe(1);

    r1();
    await p3;
    expect(third).toBe(true);
    expect(sem.inUse).toBe(2);
  });

  it("should reject an invalid permit count", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe("ReadWriteLock", () => {
  it("should let readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const r1 = await lock.acquireRead();
    const r2 = await lock.acquireRead();

    expect(lock.activeReaders).toBe(2);
    r1();
    r2();
    expect(lock.activeReaders).toBe(0);
  });

  it("should make a writer wait for active readers", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];

    const releaseRead = await lock.acquireRead();
    const writer = lock.write(() => {
      order.push("write");
    });

    await tick();
    expect(order).toEqual([]);

    order.push("read-done");
    releaseRead();
    await writer;

    expect(order).toEqual(["read-done", "write"]);
  });

  it("should hold new readers behind a queued writer", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];

    const releaseRead = await lock.acquireRead();
    const writer = lock.write(() => {
      order.push("write");
    });
    const reader = lock.read(() => {
      order.push("read");
    });

    releaseRead();
    await Promise.all([writer, reader]);

    expect(order).toEqual(["write", "read"]);
  });

  it("should exclude everyone while writing", async () => {
    const lock = new ReadWriteLock();
    const releaseWrite = await lock.acquireWrite();
    expect(lock.isWriteLocked).toBe(true);

    let admitted = 0;
    const readers = [lock.read(() => admitted++), lock.read(() => admitted++)];
    await tick();
    expect(admitted).toBe(0);

    releaseWrite();
    await Promise.all(readers);
    expect(admitted).toBe(2);
    expect(lock.isWriteLocked).toBe(false);
  });
});
