import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { PassThrough } from "stream";
import { StreamDrainer, READ_BUFFER_SIZE } from "../services/stream-drainer.service.js";
import { HandoffQueue, receive } from "../utils/handoff-queue.js";
import type { Chunk } from "../types/session.types.js";
import { createLogger } from "../../../shared/logger.js";

describe("StreamDrainer", () => {
  let stream: PassThrough;
  let queue: HandoffQueue<Chunk>;
  let controller: AbortController;
  let onFailure: Mock<(reason: Error) => void>;
  let running: Promise<void>;

  beforeEach(() => {
    stream = new PassThrough();
    queue = new HandoffQueue<Chunk>();
    controller = new AbortController();
    onFailure = vi.fn<(reason: Error) => void>();
    running = new StreamDrainer({
      source: "stdout",
      stream,
      queue,
      signal: controller.signal,
      onFailure,
      logger: createLogger("test", "error"),
    }).run();
  });

  it("should forward each read as one tagged chunk", async () => {
    stream.write("hello");
    await expect(receive([queue], 1000)).resolves.toEqual({ source: "stdout", text: "hello" });

    stream.write("world");
    await expect(receive([queue], 1000)).resolves.toEqual({ source: "stdout", text: "world" });

    controller.abort();
    stream.destroy();
    await running;
  });

  it("should cap a chunk at the read buffer size", async () => {
    stream.write(Buffer.alloc(READ_BUFFER_SIZE + 10, "a"));

    const first = await receive([queue], 1000);
    const second = await receive([queue], 1000);

    expect(first?.text.length).toBe(READ_BUFFER_SIZE);
    expect(second?.text).toBe("a".repeat(10));

    controller.abort();
    stream.destroy();
    await running;
  });

  it("should hold back a multi-byte character split across reads", async () => {
    stream.write(Buffer.from([0xe2, 0x82]));
    await new Promise((resolve) => setImmediate(resolve));
    expect(queue.size).toBe(0);

    stream.write(Buffer.from([0xac]));

    await expect(receive([queue], 1000)).resolves.toEqual({ source: "stdout", text: "€" });

    controller.abort();
    stream.destroy();
    await running;
  });

  it("should report end of stream as a failure", async () => {
    stream.end();
    await running;

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]?.[0].message).toBe("stdout stream ended");
  });

  it("should report a read error as a failure", async () => {
    stream.destroy(new Error("connection reset"));
    await running;

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]?.[0].message).toBe("connection reset");
  });

  it("should exit quietly when stopped while waiting for a consumer", async () => {
    stream.write("unread");
    await vi.waitFor(() => expect(queue.size).toBe(1));

    controller.abort();
    await running;

    expect(onFailure).not.toHaveBeenCalled();
    expect(queue.size).toBe(0);
  });

  it("should not report a failure once the session stopped", async () => {
    controller.abort();
    stream.destroy(new Error("closed"));
    await running;

    expect(onFailure).not.toHaveBeenCalled();
  });
});
