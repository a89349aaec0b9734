import { parseArgs } from "util";
import { errorMessage } from "./features/remote-shell/utils/errors.js";

export interface CLIArgs {
  commands: string[];
  timeoutMs?: number | undefined;
  terminators: string[];
  container?: string | undefined;
}

export type ParsedArgs =
  | { kind: "run"; args: CLIArgs }
  | { kind: "help" }
  | { kind: "error"; message: string };

export function printUsage(): void {
  console.log(`
remote-shell - Run commands in one interactive remote shell

Usage:
  remote-shell run [options] -- <command>...

Options:
  --timeout <ms>         Idle window while waiting for each reply (default: COMMAND_TIMEOUT_MS)
  --terminator <text>    Completion pattern, repeatable; ^text prefix, text$ suffix, else substring
  --container <id>       Run the shell in a Docker container instead of over SSH
  --help                 Show this help message

Environment Variables:
  SSH_HOST, SSH_PORT, SSH_USER   SSH target (host and user required over SSH)
  SSH_PRIVATE_KEY_PATH           Private key for authentication
  SSH_PASSWORD                   Password for authentication
  DOCKER_SOCKET_PATH             Docker socket (default: /var/run/docker.sock)
  REMOTE_SHELL                   Shell to start (default: /bin/bash)
  REMOTE_TERM, REMOTE_ROWS, REMOTE_COLUMNS
  COMMAND_TIMEOUT_MS             Default reply timeout (default: 5000)
  LOG_LEVEL                      debug, info, warn or error (default: info)

Examples:
  SSH_HOST=10.0.0.5 SSH_USER=deploy remote-shell run -- "cd /srv/app" "git status"
  remote-shell run --container web-1 --terminator "done$" -- "./migrate.sh && echo done"
`);
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      timeout: { type: "string" },
      terminator: { type: "string", multiple: true },
      container: { type: "string" },
      help: { type: "boolean" },
    },
    allowPositionals: true,
  });
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (error) {
    return { kind: "error", message: `Error parsing arguments: ${errorMessage(error)}` };
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: "help" };
  }

  if (positionals[0] !== "run") {
    return { kind: "error", message: "Error: First argument must be 'run'" };
  }

  const commands = positionals.slice(1);
  if (commands.length === 0) {
    return { kind: "error", message: "Error: At least one command is required" };
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    timeoutMs = Number(values.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      return { kind: "error", message: `Error: Invalid --timeout '${values.timeout}'` };
    }
  }

  return {
    kind: "run",
    args: {
      commands,
      timeoutMs,
      terminators: values.terminator ?? [],
      container: values.container,
    },
  };
}
