import { describe, expect, it } from "vitest";
import { SerialQueue } from "./serial-queue.js";

describe("SerialQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run(async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
      return 1;
    });
    const second = queue.run(() => {
      order.push("second");
      return 2;
    });

    expect(queue.size).toBe(2);
    release();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("keeps draining after a task fails", async () => {
    const queue = new SerialQueue();
    const failed = queue.run(() => {
      throw new Error("boom");
    });
    const next = queue.run(() => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
    await queue.idle();
    expect(queue.size).toBe(0);
  });
});
