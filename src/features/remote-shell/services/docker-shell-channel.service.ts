import type Docker from "dockerode";
import { PassThrough, type Duplex, type Writable } from "stream";
import type {
  PtyRequest,
  RemoteShellChannel,
  RemoteShellStreams,
  RemoteShellTransport,
} from "../interfaces/remote-shell-channel.interface.js";
import { errorMessage } from "../utils/errors.js";
import type { Logger } from "../../../shared/logger.js";

/**
 * Exec instance operations used by the adapter
 */
export interface DockerExecHandle {
  start(options: Docker.ExecStartOptions): Promise<Duplex>;
  resize(options: { h: number; w: number }): Promise<unknown>;
}

/**
 * The part of a Dockerode client this adapter needs
 */
export interface DockerExecClient {
  getContainer(containerId: string): {
    exec(options: Docker.ExecCreateOptions): Promise<DockerExecHandle>;
  };
  modem: {
    demuxStream(stream: Duplex, stdout: Writable, stderr: Writable): void;
  };
}

/**
 * Opens interactive shells inside a running container
 */
export class DockerShellTransport implements RemoteShellTransport {
  private readonly docker: DockerExecClient;
  private readonly containerId: string;
  private readonly logger: Logger;

  constructor(docker: DockerExecClient, containerId: string, logger: Logger) {
    this.docker = docker;
    this.containerId = containerId;
    this.logger = logger;
  }

  async openChannel(): Promise<RemoteShellChannel> {
    return new DockerShellChannel(this.docker, this.containerId, this.logger);
  }
}

/**
 * Shell channel backed by a Docker exec instance.
 *
 * With a TTY Docker merges stderr into stdout, so the stderr stream stays
 * silent. Without one the hijacked stream carries multiplexed frames that
 * are split onto stdout and stderr. Docker has no terminal mode requests;
 * echo is turned off with `stty` before the shell replaces it.
 */
export class DockerShellChannel implements RemoteShellChannel {
  private readonly docker: DockerExecClient;
  private readonly containerId: string;
  private readonly logger: Logger;
  private readonly env: string[] = [];
  private pty: PtyRequest | undefined;
  private readonly stdin = new PassThrough();
  private readonly stdout = new PassThrough();
  private readonly stderr = new PassThrough();
  private stream: Duplex | undefined;
  private started = false;
  private closed = false;

  constructor(docker: DockerExecClient, containerId: string, logger: Logger) {
    this.docker = docker;
    this.containerId = containerId;
    this.logger = logger;
  }

  async setEnv(name: string, value: string): Promise<void> {
    this.env.push(`${name}=${value}`);
  }

  async requestPty(request: PtyRequest): Promise<void> {
    this.pty = request;
    this.env.push(`TERM=${request.term}`);
  }

  openStreams(): RemoteShellStreams & { stdin: PassThrough; stdout: PassThrough; stderr: PassThrough } {
    return { stdin: this.stdin, stdout: this.stdout, stderr: this.stderr };
  }

  async start(program: string): Promise<void> {
    if (this.closed) {
      throw new Error("Channel is closed");
    }
    if (this.started) {
      throw new Error("Program already started on this channel");
    }
    this.started = true;

    const exec = await this.docker.getContainer(this.containerId).exec({
      Cmd: this.command(program),
      AttachStdin: true,
      AttachStdout: true,
      AttachStderr: true,
      Tty: this.pty !== undefined,
      Env: this.env,
    });
    const stream = await exec.start({ hijack: true, stdin: true, Tty: this.pty !== undefined });

    if (this.closed) {
      stream.destroy();
      throw new Error("Channel closed before the program started");
    }

    this.stream = stream;
    if (this.pty) {
      stream.pipe(this.stdout);
    } else {
      this.docker.modem.demuxStream(stream, this.stdout, this.stderr);
      stream.on("end", () => {
        this.stdout.end();
        this.stderr.end();
      });
    }
    this.stdin.pipe(stream);
    stream.on("error", (error: Error) => this.stdout.destroy(error));
    stream.on("close", () => this.destroyStreams());

    if (this.pty) {
      try {
        await exec.resize({ h: this.pty.rows, w: this.pty.columns });
      } catch (error) {
        // Resize fails if the exec already exited; the session notices through the streams
        this.logger.warn(`Failed to resize exec in container ${this.containerId}`, {
          reason: errorMessage(error),
        });
      }
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stream?.destroy();
    this.destroyStreams();
  }

  private command(program: string): string[] {
    if (this.pty && !this.pty.modes.echo) {
      return ["/bin/sh", "-c", `stty -echo; exec ${program}`];
    }
    return [program];
  }

  private destroyStreams(): void {
    this.stdin.destroy();
    this.stdout.destroy();
    this.stderr.destroy();
  }
}
