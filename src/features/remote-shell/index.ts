// Services
export { createMultiCommandSession, RemoteShellSession, normalizeKernelName } from "./services/multi-command-session.service.js";
export { ResponseCollector, DEFAULT_TIMEOUT_MS } from "./services/response-collector.service.js";
export { StreamDrainer, READ_BUFFER_SIZE } from "./services/stream-drainer.service.js";
export { SshShellTransport, SshShellChannel, connectSsh } from "./services/ssh-shell-channel.service.js";
export { DockerShellTransport, DockerShellChannel } from "./services/docker-shell-channel.service.js";

// Utils
export { matches, parseTerminator, parseTerminators } from "./utils/terminator-matcher.js";
export { HandoffQueue, receive } from "./utils/handoff-queue.js";
export { RemoteStderrError } from "./utils/errors.js";

// Schemas
export { sessionConfigSchema, parseSessionConfig } from "./schemas/session.schemas.js";
export type { SessionConfig, SessionConfigInput } from "./schemas/session.schemas.js";

// Interfaces
export type {
  RemoteShellChannel,
  RemoteShellTransport,
  RemoteShellStreams,
  PtyRequest,
  TerminalModes,
} from "./interfaces/remote-shell-channel.interface.js";
export type { SessionOptions } from "./services/multi-command-session.service.js";
export type { SshConnectOptions, SshExecClient } from "./services/ssh-shell-channel.service.js";
export type { DockerExecClient, DockerExecHandle } from "./services/docker-shell-channel.service.js";

// Types
export type { Chunk, ChunkSource, MultiCommandSession, ShellResponse } from "./types/session.types.js";
export type { TerminatorSpec } from "./types/terminator.types.js";
