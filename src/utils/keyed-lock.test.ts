/**
 * keyed-lock.test.ts - Unit tests for per-key serialisation
 */

import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock";

/** A promise plus the function that resolves it. */
function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs work for the same key one after another", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("articles", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("articles", async () => {
      order.push("second:start");
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("lets different keys run in parallel", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const blocked = lock.run("articles", async () => {
      await gate.promise;
      order.push("articles");
    });
    await lock.run("faqs", async () => {
      order.push("faqs");
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(["faqs", "articles"]);
  });

  it("passes results and errors through and keeps going after a failure", async () => {
    const lock = new KeyedLock();

    const failing = lock.run("articles", async () => {
      throw new Error("write failed");
    });
    const next = lock.run("articles", async () => 42);

    await expect(failing).rejects.toThrow("write failed");
    await expect(next).resolves.toBe(42);
  });

  it("forgets keys once their work is done", async () => {
    const lock = new KeyedLock();

    await lock.run("articles", async () => undefined);

    expect(lock.size).toBe(0);
  });
});
