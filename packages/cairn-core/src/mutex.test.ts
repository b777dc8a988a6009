import { describe, expect, it } from "vitest";

import { Mutex } from "./mutex.ts";

const tick = (ms = 5) => new Promise((resolve) => setTimeout(resolve, ms));

describe("Mutex", () => {
  it("runs critical sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const log: string[] = [];

    const task = (id: number) =>
      mutex.runExclusive(async () => {
        log.push(`start ${id}`);
        await tick();
        log.push(`end ${id}`);
        return id;
      });

    const results = await Promise.all([task(1), task(2), task(3)]);

    expect(results).toEqual([1, 2, 3]);
    expect(log).toEqual(["start 1", "end 1", "start 2", "end 2", "start 3", "end 3"]);
    expect(mutex.isLocked()).toBe(false);
  });

  it("counts waiters", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const second = mutex.acquire();
    expect(mutex.pending).toBe(1);

    release();
    const releaseSecond = await second;
    expect(mutex.pending).toBe(0);
    expect(mutex.isLocked()).toBe(true);

    releaseSecond();
    expect(mutex.isLocked()).toBe(false);
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    release();
    const again = await mutex.acquire();
    release();
    expect(mutex.isLocked()).toBe(true);
    again();
    expect(mutex.isLocked()).toBe(false);
  });

  it("releases the lock when the section throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(() => "after")).resolves.toBe("after");
  });
});
