import { describe, it, expect } from "vitest";
import { HandoffQueue, receive } from "../utils/handoff-queue.js";

interface Item {
  n: number;
}

describe("HandoffQueue", () => {
  it("should settle push only after the item is taken", async () => {
    const queue = new HandoffQueue<Item>();
    let delivered = false;
    const pushed = queue.push({ n: 1 }).then(() => {
      delivered = true;
    });

    await Promise.resolve();
    expect(delivered).toBe(false);
    expect(queue.size).toBe(1);

    expect(queue.tryTake()).toEqual({ n: 1 });
    await pushed;
    expect(delivered).toBe(true);
    expect(queue.size).toBe(0);
  });

  it("should return undefined from tryTake when nothing is pending", () => {
    const queue = new HandoffQueue<Item>();
    expect(queue.tryTake()).toBeUndefined();
  });

  it("should withdraw the item when the push is aborted", async () => {
    const queue = new HandoffQueue<Item>();
    const controller = new AbortController();
    const pushed = queue.push({ n: 1 }, controller.signal);

    controller.abort(new Error("stopped"));

    await expect(pushed).rejects.toThrow("stopped");
    expect(queue.size).toBe(0);
  });

  it("should reject immediately when the signal is already aborted", async () => {
    const queue = new HandoffQueue<Item>();
    const controller = new AbortController();
    controller.abort(new Error("gone"));

    await expect(queue.push({ n: 1 }, controller.signal)).rejects.toThrow("gone");
    expect(queue.size).toBe(0);
  });

  describe("receive()", () => {
    it("should take an already pending item without waiting", async () => {
      const first = new HandoffQueue<Item>();
      const second = new HandoffQueue<Item>();
      const pushed = second.push({ n: 2 });

      await expect(receive([first, second], 1000)).resolves.toEqual({ n: 2 });
      await pushed;
    });

    it("should deliver an item pushed while waiting", async () => {
      const first = new HandoffQueue<Item>();
      const second = new HandoffQueue<Item>();
      const received = receive([first, second], 1000);

      await first.push({ n: 7 });

      await expect(received).resolves.toEqual({ n: 7 });
    });

    it("should leave items on losing queues untouched", async () => {
      const first = new HandoffQueue<Item>();
      const second = new HandoffQueue<Item>();
      const received = receive([first, second], 1000);

      const pushedFirst = first.push({ n: 1 });
      const pushedSecond = second.push({ n: 2 });

      await expect(received).resolves.toEqual({ n: 1 });
      await pushedFirst;
      expect(second.size).toBe(1);
      expect(second.tryTake()).toEqual({ n: 2 });
      await pushedSecond;
    });

    it("should resolve undefined when the timer fires first", async () => {
      const queue = new HandoffQueue<Item>();
      const startedAt = Date.now();

      await expect(receive([queue], 20)).resolves.toBeUndefined();
      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(15);
    });

    it("should not hand a later push to a timed-out wait", async () => {
      const queue = new HandoffQueue<Item>();
      await receive([queue], 5);

      const pushed = queue.push({ n: 3 });

      expect(queue.size).toBe(1);
      expect(queue.tryTake()).toEqual({ n: 3 });
      await pushed;
    });
  });
});
