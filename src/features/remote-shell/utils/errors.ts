/**
 * Soft error carrying text the remote shell wrote to stderr while a
 * response was being collected
 */
export class RemoteStderrError extends Error {
  readonly stderr: string;

  constructor(stderr: string) {
    super(stderr);
    this.name = "RemoteStderrError";
    this.stderr = stderr;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a lower-level failure as `Failed to <action>: <cause>`
 */
export function wrapError(action: string, error: unknown): Error {
  return new Error(`Failed to ${action}: ${errorMessage(error)}`, { cause: error });
}
