import type { Writable } from "stream";
import type {
  RemoteShellChannel,
  RemoteShellStreams,
  RemoteShellTransport,
  TerminalModes,
} from "../interfaces/remote-shell-channel.interface.js";
import type { Chunk, MultiCommandSession, ShellResponse } from "../types/session.types.js";
import { parseSessionConfig, type SessionConfigInput } from "../schemas/session.schemas.js";
import { HandoffQueue } from "../utils/handoff-queue.js";
import { errorMessage, wrapError } from "../utils/errors.js";
import { ResponseCollector } from "./response-collector.service.js";
import { StreamDrainer } from "./stream-drainer.service.js";
import { createLogger, type Logger } from "../../../shared/logger.js";

export const PROMPT_PROBE_TIMEOUT_MS = 1000;
export const KERNEL_PROBE_TIMEOUT_MS = 20000;
export const KERNEL_PROBE_COMMAND = "uname -s";
export const KERNEL_PROBE_TERMINATORS = ["Linux", "Darwin", "$ $", "# $"] as const;

export const TERMINAL_MODES: TerminalModes = {
  echo: false,
  inputSpeed: 14400,
  outputSpeed: 14400,
};

export interface SessionOptions {
  config?: SessionConfigInput;
  logger?: Logger;
}

/**
 * Open a channel on the transport, start the shell and run the handshake
 * that learns the prompt and the kernel name.
 *
 * Any failure tears down what was opened and rejects; no half-initialised
 * session is returned.
 */
export async function createMultiCommandSession(
  transport: RemoteShellTransport,
  options: SessionOptions = {}
): Promise<MultiCommandSession> {
  const config = parseSessionConfig(options.config);
  const logger = options.logger ?? createLogger("RemoteShell");

  let channel: RemoteShellChannel;
  try {
    channel = await transport.openChannel();
  } catch (error) {
    throw wrapError("open channel", error);
  }

  let streams: RemoteShellStreams;
  try {
    for (const [name, value] of Object.entries(config.env)) {
      await channel.setEnv(name, value);
    }
    await channel.requestPty({
      term: config.term,
      rows: config.rows,
      columns: config.columns,
      modes: TERMINAL_MODES,
    });
    streams = channel.openStreams();
  } catch (error) {
    channel.close();
    throw wrapError("prepare channel", error);
  }

  const session = new RemoteShellSession(channel, streams, logger);
  try {
    await channel.start(config.shell);
    logger.debug(`Started ${config.shell}`, { term: config.term, rows: config.rows, columns: config.columns });
    await session.handshake();
  } catch (error) {
    session.close();
    throw wrapError(`start ${config.shell}`, error);
  }
  return session;
}

/**
 * Multi-command session over one interactive shell channel.
 *
 * Stdout and stderr are drained by background readers into hand-off queues
 * as soon as the session is constructed. Commands are written to stdin and
 * their replies collected from the queues.
 */
export class RemoteShellSession implements MultiCommandSession {
  private readonly channel: RemoteShellChannel;
  private readonly stdin: Writable;
  private readonly running = new AbortController();
  private readonly collector: ResponseCollector;
  private readonly drainers: Promise<void>;
  private readonly logger: Logger;
  private prompt = "";
  private kernel = "";

  constructor(channel: RemoteShellChannel, streams: RemoteShellStreams, logger: Logger) {
    this.channel = channel;
    this.stdin = streams.stdin;
    this.logger = logger;

    const stdout = new HandoffQueue<Chunk>();
    const stderr = new HandoffQueue<Chunk>();
    this.collector = new ResponseCollector({ stdout, stderr }, () => this.prompt);

    this.stdin.on("error", (error: Error) => {
      this.logger.debug("stdin error", { reason: error.message });
    });

    const onFailure = (): void => this.close();
    this.drainers = Promise.all([
      new StreamDrainer({ source: "stdout", stream: streams.stdout, queue: stdout, signal: this.running.signal, onFailure, logger }).run(),
      new StreamDrainer({ source: "stderr", stream: streams.stderr, queue: stderr, signal: this.running.signal, onFailure, logger }).run(),
    ]).then(() => undefined);
  }

  /**
   * Absorb the banner, learn the prompt, then probe the kernel name.
   * A soft error at any step fails the handshake.
   */
  async handshake(): Promise<void> {
    const banner = await this.collector.readResponse();
    if (banner.error) {
      throw wrapError("absorb shell banner", banner.error);
    }

    const prompt = await this.run("", PROMPT_PROBE_TIMEOUT_MS);
    if (prompt.error) {
      throw wrapError("learn shell prompt", prompt.error);
    }
    this.prompt = prompt.output;
    await this.collector.drainStdout();

    const kernel = await this.run(KERNEL_PROBE_COMMAND, KERNEL_PROBE_TIMEOUT_MS, ...KERNEL_PROBE_TERMINATORS);
    await this.collector.drainStdout();
    if (kernel.error) {
      throw wrapError("probe kernel name", kernel.error);
    }
    this.kernel = normalizeKernelName(kernel.output);
    this.logger.info("Shell session ready", { prompt: this.prompt, kernel: this.kernel });
  }

  async run(command: string, timeoutMs: number = 0, ...terminators: string[]): Promise<ShellResponse> {
    await this.collector.drainStdout();
    try {
      await writeLine(this.stdin, command);
    } catch (error) {
      throw wrapError(`execute command: ${command}`, error);
    }
    return this.collector.readResponse(timeoutMs, terminators);
  }

  shellPrompt(): string {
    return this.prompt;
  }

  kernelName(): string {
    return this.kernel;
  }

  isRunning(): boolean {
    return !this.running.signal.aborted;
  }

  close(): void {
    if (this.running.signal.aborted) {
      return;
    }
    this.running.abort();
    this.stdin.end();
    try {
      this.channel.close();
    } catch (error) {
      this.logger.warn("Failed to close channel", { reason: errorMessage(error) });
    }
    this.logger.debug("Shell session closed");
  }

  /**
   * Settles once both background readers have exited
   */
  drained(): Promise<void> {
    return this.drainers;
  }
}

/**
 * Reduce a `uname -s` reply to the lower-cased kernel name on its first line
 */
export function normalizeKernelName(reply: string): string {
  const firstLine = reply.trim().toLowerCase().split(/\r?\n/, 1)[0] ?? "";
  return firstLine.trim();
}

function writeLine(stdin: Writable, line: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stdin.write(`${line}\n`, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
