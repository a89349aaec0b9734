import { DEFAULT_COLUMNS, DEFAULT_ROWS, DEFAULT_SHELL, DEFAULT_TERM } from "../features/remote-shell/schemas/session.schemas.js";
import { resolveLogLevel, type LogLevel } from "./logger.js";

const DEFAULT_SSH_PORT = 22;
const DEFAULT_COMMAND_TIMEOUT_MS = 5000;
const DEFAULT_DOCKER_SOCKET = "/var/run/docker.sock";

interface Config {
  // SSH connection
  sshHost: string;
  sshPort: number;
  sshUser: string;
  sshPrivateKeyPath?: string | undefined;
  sshPassword?: string | undefined;
  // Docker
  dockerSocketPath: string;
  // Shell session
  shell: string;
  term: string;
  rows: number;
  columns: number;
  commandTimeoutMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, defaultValue?: string): string {
  const value = env[name];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parsePositiveInt(env: Env, name: string, defaultValue: number): number {
  const raw = getEnvVar(env, name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw} (expected a positive integer)`);
  }
  return value;
}

function parsePort(env: Env): number {
  const port = parsePositiveInt(env, "SSH_PORT", DEFAULT_SSH_PORT);
  if (port > 65535) {
    throw new Error(`Invalid port number: ${port}`);
  }
  return port;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    // Only required when connecting over SSH; see assertSshTarget
    sshHost: getEnvVar(env, "SSH_HOST", ""),
    sshPort: parsePort(env),
    sshUser: getEnvVar(env, "SSH_USER", ""),
    sshPrivateKeyPath: env.SSH_PRIVATE_KEY_PATH || undefined,
    sshPassword: env.SSH_PASSWORD || undefined,
    dockerSocketPath: getEnvVar(env, "DOCKER_SOCKET_PATH", DEFAULT_DOCKER_SOCKET),
    shell: getEnvVar(env, "REMOTE_SHELL", DEFAULT_SHELL),
    term: getEnvVar(env, "REMOTE_TERM", DEFAULT_TERM),
    rows: parsePositiveInt(env, "REMOTE_ROWS", DEFAULT_ROWS),
    columns: parsePositiveInt(env, "REMOTE_COLUMNS", DEFAULT_COLUMNS),
    commandTimeoutMs: parsePositiveInt(env, "COMMAND_TIMEOUT_MS", DEFAULT_COMMAND_TIMEOUT_MS),
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };
}

/**
 * Ensure the settings needed to connect over SSH are present
 */
export function assertSshTarget(config: Config): void {
  const missing = [
    config.sshHost === "" ? "SSH_HOST" : undefined,
    config.sshUser === "" ? "SSH_USER" : undefined,
  ].filter((name): name is string => name !== undefined);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variable: ${missing.join(", ")} (or pass --container)`);
  }
}

export type { Config };
