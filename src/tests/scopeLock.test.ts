// src/tests/scopeLock.test.ts
import { ScopeLock } from "../lib/scopeLock";

const deferred = () => {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
};

describe("Scope lock", () => {
  it("should run tasks under one key one after another", async () => {
    const lock = new ScopeLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive("course:1", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = lock.runExclusive("course:1", async () => {
      events.push("second:start");
      return 2;
    });

    await Promise.resolve();
    expect(lock.isBusy("course:1")).toBe(true);
    gate.release();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(lock.isBusy("course:1")).toBe(false);
  });

  it("should not hold up other keys", async () => {
    const lock = new ScopeLock();
    const gate = deferred();
    const events: string[] = [];

    const slow = lock.runExclusive("course:1", async () => {
      await gate.promise;
      events.push("course:1");
    });
    await lock.runExclusive("course:2", async () => {
      events.push("course:2");
    });
    gate.release();
    await slow;

    expect(events).toEqual(["course:2", "course:1"]);
  });

  it("should keep going after a failed task", async () => {
    const lock = new ScopeLock();
    const failing = lock.runExclusive("k", async () => {
      throw new Error("boom");
    });
    const next = lock.runExclusive("k", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
