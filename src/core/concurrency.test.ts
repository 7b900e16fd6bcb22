import { describe, expect, it } from "vitest";
import { KeyedMutex, Semaphore } from "./concurrency.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Semaphore", () => {
  it("rejects sizes below one", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore size must be a positive integer, got 0");
  });

  it("never runs more than its size at once", async () => {
    const sem = new Semaphore(2);
    let running = 0;
    let peak = 0;
    const gates = [deferred(), deferred(), deferred()];

    const tasks = gates.map((gate) =>
      sem.run(async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
      }),
    );
    for (const gate of gates) gate.resolve();
    await Promise.all(tasks);

    expect(peak).toBe(2);
  });

  it("releases its slot when a task throws", async () => {
    const sem = new Semaphore(1);
    await expect(sem.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await sem.run(async () => "next")).toBe("next");
  });
});

describe("KeyedMutex", () => {
  it("runs tasks for one key in order and frees the key afterwards", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run("a", async () => {
      await gate.promise;
      order.push("a1");
    });
    const second = mutex.run("a", async () => {
      order.push("a2");
    });
    const other = mutex.run("b", async () => {
      order.push("b1");
    });

    await other;
    expect(order).toEqual(["b1"]);
    expect(mutex.isLocked("a")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["b1", "a1", "a2"]);
    expect(mutex.isLocked("a")).toBe(false);
  });
});
