import { describe, it, expect } from "vitest";
import { SerialQueue } from "./serial-queue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialQueue", () => {
  it("runs tasks one after another in submission order", async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = queue.run(async () => {
      order.push("second");
      return 2;
    });

    expect(queue.size).toBe(2);
    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
