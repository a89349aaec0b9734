import { readFile } from "fs/promises";
import { PassThrough } from "stream";
import { Client, type ClientChannel, type ConnectConfig, type ExecOptions, type PseudoTtyOptions } from "ssh2";
import type {
  PtyRequest,
  RemoteShellChannel,
  RemoteShellStreams,
  RemoteShellTransport,
} from "../interfaces/remote-shell-channel.interface.js";
import { wrapError } from "../utils/errors.js";

/**
 * The part of an ssh2 `Client` this adapter needs
 */
export interface SshExecClient {
  exec(
    command: string,
    options: ExecOptions,
    callback: (err: Error | undefined, channel: ClientChannel) => void
  ): unknown;
}

export interface SshConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKeyPath?: string | undefined;
  password?: string | undefined;
  readyTimeoutMs?: number | undefined;
}

/**
 * Connect and authenticate an ssh2 client
 * @returns Client in the ready state
 */
export async function connectSsh(options: SshConnectOptions): Promise<Client> {
  const config: ConnectConfig = {
    host: options.host,
    port: options.port,
    username: options.username,
  };
  if (options.privateKeyPath) {
    try {
      config.privateKey = await readFile(options.privateKeyPath);
    } catch (error) {
      throw wrapError(`read private key from ${options.privateKeyPath}`, error);
    }
  }
  if (options.password) {
    config.password = options.password;
  }
  if (options.readyTimeoutMs !== undefined) {
    config.readyTimeout = options.readyTimeoutMs;
  }

  return new Promise<Client>((resolve, reject) => {
    const client = new Client();
    client.once("ready", () => resolve(client));
    client.once("error", (error: Error) => {
      reject(wrapError(`connect to ${options.host}:${options.port} as ${options.username}`, error));
    });
    client.connect(config);
  });
}

/**
 * Opens shell channels on a connected ssh2 client
 */
export class SshShellTransport implements RemoteShellTransport {
  private readonly client: SshExecClient;

  constructor(client: SshExecClient) {
    this.client = client;
  }

  async openChannel(): Promise<RemoteShellChannel> {
    return new SshShellChannel(this.client);
  }
}

/**
 * ssh2 sends env and pty requests together with the exec request, so both
 * are recorded here and applied in `start`. The streams handed out are
 * pass-throughs that get wired to the real channel once it exists.
 */
export class SshShellChannel implements RemoteShellChannel {
  private readonly client: SshExecClient;
  private readonly env: Record<string, string> = {};
  private pty: PseudoTtyOptions | undefined;
  private readonly stdin = new PassThrough();
  private readonly stdout = new PassThrough();
  private readonly stderr = new PassThrough();
  private channel: ClientChannel | undefined;
  private closed = false;

  constructor(client: SshExecClient) {
    this.client = client;
  }

  async setEnv(name: string, value: string): Promise<void> {
    this.env[name] = value;
  }

  async requestPty(request: PtyRequest): Promise<void> {
    this.pty = {
      term: request.term,
      rows: request.rows,
      cols: request.columns,
      modes: {
        ECHO: request.modes.echo ? 1 : 0,
        TTY_OP_ISPEED: request.modes.inputSpeed,
        TTY_OP_OSPEED: request.modes.outputSpeed,
      },
    };
  }

  openStreams(): RemoteShellStreams {
    return { stdin: this.stdin, stdout: this.stdout, stderr: this.stderr };
  }

  start(program: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("Channel is closed"));
    }
    if (this.channel) {
      return Promise.reject(new Error("Program already started on this channel"));
    }

    const options: ExecOptions = { env: this.env };
    if (this.pty) {
      options.pty = this.pty;
    }

    return new Promise<void>((resolve, reject) => {
      this.client.exec(program, options, (err, channel) => {
        if (err) {
          reject(err);
          return;
        }
        if (this.closed) {
          channel.close();
          reject(new Error("Channel closed before the program started"));
          return;
        }

        this.channel = channel;
        channel.pipe(this.stdout);
        channel.stderr.pipe(this.stderr);
        this.stdin.pipe(channel);
        channel.on("error", (error: Error) => this.stdout.destroy(error));
        channel.on("close", () => this.destroyStreams());
        resolve();
      });
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.channel?.close();
    this.destroyStreams();
  }

  private destroyStreams(): void {
    this.stdin.destroy();
    this.stdout.destroy();
    this.stderr.destroy();
  }
}
