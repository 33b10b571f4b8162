import { describe, expect, it } from "vitest";
import { Mutex } from "./Mutex";

describe("Mutex", () => {
  it("hands the lock to waiters in arrival order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map(async (n) => {
        await mutex.acquire();
        order.push(n);
        await Promise.resolve();
        order.push(n * 10);
        mutex.release();
      })
    );

    expect(order).toEqual([1, 10, 2, 20, 3, 30]);
    expect(mutex.locked).toBe(false);
  });

  it("stays locked while handing over to the next waiter", async () => {
    const mutex = new Mutex();
    await mutex.acquire();
    const next = mutex.acquire();

    mutex.release();
    expect(mutex.locked).toBe(true);
    expect(mutex.waiting).toBe(0);

    await next;
    mutex.release();
    expect(mutex.locked).toBe(false);
  });

  it("drops a waiter whose signal aborts", async () => {
    const mutex = new Mutex();
    await mutex.acquire();

    const controller = new AbortController();
    const waiter = mutex.acquire(controller.signal);
    expect(mutex.waiting).toBe(1);

    controller.abort(new Error("gone"));
    await expect(waiter).rejects.toThrow("gone");
    expect(mutex.waiting).toBe(0);

    mutex.release();
    expect(mutex.locked).toBe(false);
  });

  it("rejects at once when the signal is already aborted", async () => {
    const mutex = new Mutex();
    const controller = new AbortController();
    controller.abort();

    await expect(mutex.acquire(controller.signal)).rejects.toBe(
      controller.signal.reason
    );
    expect(mutex.locked).toBe(false);
  });
});
