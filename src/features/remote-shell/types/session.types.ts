import type { RemoteStderrError } from "../utils/errors.js";

/**
 * Stream a chunk was read from
 */
export type ChunkSource = "stdout" | "stderr";

/**
 * Decoded text produced by one successful read of a remote stream
 */
export interface Chunk {
  source: ChunkSource;
  text: string;
}

/**
 * Result of one command round trip
 */
export interface ShellResponse {
  /** Aggregated stdout text, with the echoed next prompt removed */
  output: string;

  /** Soft error built from whatever arrived on stderr during the window */
  error?: RemoteStderrError;
}

/**
 * Sequential command runner over one interactive remote shell.
 *
 * Calls to `run` must be serialized by the caller; nothing here locks.
 */
export interface MultiCommandSession {
  /**
   * Flush stale output, send `command` followed by a newline and collect the reply
   * @param command - Shell input line, without the trailing newline
   * @param timeoutMs - Idle window while waiting for output (0 means the default)
   * @param terminators - Completion patterns; `^x` prefix, `x$` suffix, otherwise substring
   */
  run(command: string, timeoutMs?: number, ...terminators: string[]): Promise<ShellResponse>;

  /** Idle prompt text learned during the handshake */
  shellPrompt(): string;

  /** Lower-cased kernel name reported by the remote host, e.g. `linux` */
  kernelName(): string;

  /** Stop the drainers and release the channel; safe to call more than once */
  close(): void;
}
