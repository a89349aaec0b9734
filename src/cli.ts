#!/usr/bin/env node

import Docker from "dockerode";
import type { Client } from "ssh2";
import { assertSshTarget, loadConfig, type Config } from "./shared/config.js";
import { createLogger, type Logger } from "./shared/logger.js";
import { createMultiCommandSession } from "./features/remote-shell/services/multi-command-session.service.js";
import { connectSsh, SshShellTransport } from "./features/remote-shell/services/ssh-shell-channel.service.js";
import { DockerShellTransport } from "./features/remote-shell/services/docker-shell-channel.service.js";
import type { RemoteShellTransport } from "./features/remote-shell/interfaces/remote-shell-channel.interface.js";
import type { MultiCommandSession } from "./features/remote-shell/types/session.types.js";
import { errorMessage } from "./features/remote-shell/utils/errors.js";
import { parseCliArgs, printUsage, type CLIArgs } from "./cli-args.js";

/**
 * CLI for running a batch of commands in one remote shell
 *
 * Exit Codes:
 * - 0: All commands sent
 * - 1: Connection, handshake or write failure
 * - 2: Usage or configuration error
 */

async function openTransport(
  args: CLIArgs,
  config: Config,
  logger: Logger
): Promise<{ transport: RemoteShellTransport; client?: Client }> {
  if (args.container) {
    const docker = new Docker({ socketPath: config.dockerSocketPath });
    return { transport: new DockerShellTransport(docker, args.container, logger) };
  }

  const client = await connectSsh({
    host: config.sshHost,
    port: config.sshPort,
    username: config.sshUser,
    privateKeyPath: config.sshPrivateKeyPath,
    password: config.sshPassword,
  });
  return { transport: new SshShellTransport(client), client };
}

async function runCommands(session: MultiCommandSession, args: CLIArgs, config: Config): Promise<void> {
  const timeoutMs = args.timeoutMs ?? config.commandTimeoutMs;
  for (const command of args.commands) {
    const response = await session.run(command, timeoutMs, ...args.terminators);
    if (response.output.length > 0) {
      process.stdout.write(`${response.output}\n`);
    }
    if (response.error) {
      process.stderr.write(`${response.error.stderr}\n`);
    }
  }
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === "help") {
    printUsage();
    return;
  }
  if (parsed.kind === "error") {
    console.error(parsed.message);
    printUsage();
    process.exit(2);
  }

  let config: Config;
  try {
    config = loadConfig();
    if (!parsed.args.container) {
      assertSshTarget(config);
    }
  } catch (error) {
    console.error(`ERROR: ${errorMessage(error)}`);
    process.exit(2);
  }

  const logger = createLogger("RemoteShell", config.logLevel);
  const { transport, client } = await openTransport(parsed.args, config, logger);
  try {
    const session = await createMultiCommandSession(transport, {
      config: {
        shell: config.shell,
        term: config.term,
        rows: config.rows,
        columns: config.columns,
      },
      logger,
    });
    logger.debug("Handshake complete", { prompt: session.shellPrompt(), kernel: session.kernelName() });
    try {
      await runCommands(session, parsed.args, config);
    } finally {
      session.close();
    }
  } finally {
    client?.end();
  }
}

main().catch((error: unknown) => {
  console.error("remote-shell failed:", errorMessage(error));
  process.exit(1);
});
