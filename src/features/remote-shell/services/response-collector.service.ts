import type { Chunk, ShellResponse } from "../types/session.types.js";
import type { TerminatorSpec } from "../types/terminator.types.js";
import { receive, type HandoffQueue } from "../utils/handoff-queue.js";
import { matchesSpec, parseTerminators } from "../utils/terminator-matcher.js";
import { RemoteStderrError } from "../utils/errors.js";

export const DEFAULT_TIMEOUT_MS = 5000;

/** Idle window used when flushing stale output */
export const FLUSH_TIMEOUT_MS = 1;

/** Fallback terminator while no prompt has been learned: text ending in "$ " */
export const FALLBACK_PROMPT_TERMINATOR: TerminatorSpec = { kind: "suffix", value: "$ " };

/** Terminator list that never matches, so collection runs until the idle window closes */
const NO_TERMINATORS: readonly string[] = [""];

const PROMPT_LINE_BREAK = "\r\n";

export interface ChunkQueues {
  stdout: HandoffQueue<Chunk>;
  stderr: HandoffQueue<Chunk>;
}

/**
 * Aggregates chunks from both remote streams into one response
 */
export class ResponseCollector {
  private readonly queues: ChunkQueues;
  private readonly shellPrompt: () => string;

  /**
   * @param shellPrompt - Returns the learned prompt, or "" before the handshake learned it
   */
  constructor(queues: ChunkQueues, shellPrompt: () => string) {
    this.queues = queues;
    this.shellPrompt = shellPrompt;
  }

  /**
   * Collect chunks until a terminator matches with nothing else queued on that
   * stream, or until no chunk arrives within the timeout.
   *
   * A timeout is not a failure: whatever arrived so far is returned.
   *
   * @param timeoutMs - Idle window per wait; 0 means DEFAULT_TIMEOUT_MS, a negative value expires at once
   * @param terminators - Empty list falls back to the learned prompt
   */
  async readResponse(timeoutMs: number = 0, terminators: readonly string[] = []): Promise<ShellResponse> {
    const timeout = timeoutMs === 0 ? DEFAULT_TIMEOUT_MS : Math.max(timeoutMs, 0);
    const prompt = this.shellPrompt();
    const specs = terminators.length > 0 ? parseTerminators(terminators) : defaultTerminators(prompt);
    const isComplete = (text: string): boolean => specs.some((spec) => matchesSpec(text, spec));

    let output = "";
    let errorOutput = "";

    for (;;) {
      const chunk = await receive([this.queues.stdout, this.queues.stderr], timeout);
      if (!chunk) {
        break;
      }

      if (chunk.source === "stdout") {
        output += chunk.text;
        if (isComplete(output) && this.queues.stdout.size === 0) {
          break;
        }
      } else {
        errorOutput += chunk.text;
        if (isComplete(errorOutput) && this.queues.stderr.size === 0) {
          break;
        }
      }
    }

    const response: ShellResponse = { output: stripPromptEcho(output, prompt) };
    if (errorOutput.length > 0) {
      response.error = new RemoteStderrError(errorOutput);
    }
    return response;
  }

  /**
   * Discard leftover output until a short idle window passes with no stdout
   */
  async drainStdout(): Promise<void> {
    for (;;) {
      const { output } = await this.readResponse(FLUSH_TIMEOUT_MS, NO_TERMINATORS);
      if (output.length === 0) {
        return;
      }
    }
  }
}

export function defaultTerminators(shellPrompt: string): TerminatorSpec[] {
  if (shellPrompt.length > 0) {
    return [{ kind: "suffix", value: shellPrompt }];
  }
  return [FALLBACK_PROMPT_TERMINATOR];
}

/**
 * Cut the output just before the last line break followed by the prompt
 */
export function stripPromptEcho(output: string, shellPrompt: string): string {
  if (output.length === 0 || shellPrompt.length === 0) {
    return output;
  }
  const index = output.lastIndexOf(PROMPT_LINE_BREAK + shellPrompt);
  return index >= 0 ? output.slice(0, index) : output;
}
