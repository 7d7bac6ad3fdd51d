import { describe, expect, it } from "vitest";

import { KeyedLock } from "../keyed-lock";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("should run callers for the same key one at a time in arrival order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run("acme/demo", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.run("acme/demo", async () => {
      events.push("second:start");
      events.push("second:end");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(lock.isLocked("acme/demo")).toBe(true);
    expect(lock.pending("acme/demo")).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("should not make different keys wait on each other", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lock.run("acme/one", async () => {
      await gate.promise;
      events.push("one");
    });
    await lock.run("acme/two", async () => {
      events.push("two");
    });

    expect(events).toEqual(["two"]);
    gate.resolve();
    await blocked;
    expect(events).toEqual(["two", "one"]);
  });

  it("should release the key when the callback throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("acme/demo", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(lock.isLocked("acme/demo")).toBe(false);
    await expect(lock.run("acme/demo", async () => "next")).resolves.toBe("next");
  });

  it("should report an idle key as unlocked", () => {
    const lock = new KeyedLock();

    expect(lock.isLocked("unknown")).toBe(false);
    expect(lock.pending("unknown")).toBe(0);
  });
});
