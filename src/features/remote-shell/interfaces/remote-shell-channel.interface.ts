import type { Readable, Writable } from "stream";

/**
 * Terminal modes requested together with the pseudo-terminal
 */
export interface TerminalModes {
  /** Whether the terminal echoes input back to the output stream */
  echo: boolean;
  /** Input speed in baud */
  inputSpeed: number;
  /** Output speed in baud */
  outputSpeed: number;
}

/**
 * Pseudo-terminal request
 */
export interface PtyRequest {
  term: string;
  rows: number;
  columns: number;
  modes: TerminalModes;
}

/**
 * The three byte streams of a remote shell channel
 */
export interface RemoteShellStreams {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
}

/**
 * One interactive channel on an already connected and authenticated transport.
 *
 * Calls happen in this order: `setEnv` (any number of times), `requestPty`,
 * `openStreams`, `start`. The streams must be readable before `start` so no
 * early output is lost.
 */
export interface RemoteShellChannel {
  /** Set an environment variable for the program started on this channel */
  setEnv(name: string, value: string): Promise<void>;

  requestPty(request: PtyRequest): Promise<void>;

  openStreams(): RemoteShellStreams;

  /** Start `program` on the channel; its I/O flows through the opened streams */
  start(program: string): Promise<void>;

  /**
   * Release the channel. Pending reads on the streams must end or fail
   * once this returns.
   */
  close(): void;
}

/**
 * Connected transport that can open shell channels
 */
export interface RemoteShellTransport {
  openChannel(): Promise<RemoteShellChannel>;
}
