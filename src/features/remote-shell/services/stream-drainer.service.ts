import type { Readable } from "stream";
import { StringDecoder } from "string_decoder";
import type { Chunk, ChunkSource } from "../types/session.types.js";
import type { HandoffQueue } from "../utils/handoff-queue.js";
import type { Logger } from "../../../shared/logger.js";

/** Largest chunk handed over for a single read */
export const READ_BUFFER_SIZE = 128 * 1024;

export interface StreamDrainerOptions {
  source: ChunkSource;
  stream: Readable;
  queue: HandoffQueue<Chunk>;
  /** Aborted when the session stops running */
  signal: AbortSignal;
  /** Called once when the stream fails or ends while the session is still running */
  onFailure: (reason: Error) => void;
  logger: Logger;
}

/**
 * Background reader for one remote stream.
 *
 * Every read becomes one chunk on the queue. Any read failure, end of
 * stream included, is reported through `onFailure` so the whole session
 * is torn down.
 */
export class StreamDrainer {
  private readonly options: StreamDrainerOptions;
  private readonly decoder = new StringDecoder("utf8");

  constructor(options: StreamDrainerOptions) {
    this.options = options;
  }

  /**
   * Read until the session stops or the stream fails
   * @returns Settles when the drainer has exited; never rejects
   */
  async run(): Promise<void> {
    const { source, stream, signal } = this.options;

    try {
      for await (const data of stream) {
        if (signal.aborted) {
          return;
        }
        const buffer: Buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
        for (let offset = 0; offset < buffer.length; offset += READ_BUFFER_SIZE) {
          await this.forward(buffer.subarray(offset, offset + READ_BUFFER_SIZE));
        }
      }
      this.fail(new Error(`${source} stream ended`));
    } catch (error) {
      this.fail(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async forward(bytes: Buffer): Promise<void> {
    const text = this.decoder.write(bytes);
    if (text.length === 0) {
      return;
    }
    await this.options.queue.push({ source: this.options.source, text }, this.options.signal);
  }

  private fail(reason: Error): void {
    if (this.options.signal.aborted) {
      return;
    }
    this.options.logger.warn(`Failed to read ${this.options.source}, closing session`, {
      reason: reason.message,
    });
    this.options.onFailure(reason);
  }
}
