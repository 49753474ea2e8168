import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../../../src/core/keyed-mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs callers on the same key one after another", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run("t1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.run("t1", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.run("t1", async () => {
      await gate.promise;
      order.push("t1");
    });
    await mutex.run("t2", async () => {
      order.push("t2");
    });

    expect(order).toEqual(["t2"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["t2", "t1"]);
  });

  it("keeps the queue going after a rejection", async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run("t1", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("t1", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("releases the key once idle", async () => {
    const mutex = new KeyedMutex();

    const running = mutex.run("t1", async () => {});
    expect(mutex.isLocked("t1")).toBe(true);
    await running;

    expect(mutex.isLocked("t1")).toBe(false);
  });
});
