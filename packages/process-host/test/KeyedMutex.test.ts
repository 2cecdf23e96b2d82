import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../src/core/concurrency/KeyedMutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs tasks for one key in call order", async () => {
    const mutex = new KeyedMutex<string>();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run("web", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("web", async () => {
      order.push("second");
    });

    expect(mutex.isLocked("web")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not serialize different keys", async () => {
    const mutex = new KeyedMutex<string>();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.run("web", async () => {
      await gate.promise;
      order.push("web");
    });
    await mutex.run("db", async () => {
      order.push("db");
    });

    expect(order).toEqual(["db"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["db", "web"]);
  });

  it("keeps going after a failing task", async () => {
    const mutex = new KeyedMutex<string>();
    const failing = mutex.run("web", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("web", async () => "ran");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ran");
  });

  it("releases the key when idle", async () => {
    const mutex = new KeyedMutex<string>();
    await mutex.run("web", async () => undefined);
    await new Promise((resolve) => setImmediate(resolve));
    expect(mutex.isLocked("web")).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
