import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { Duplex, PassThrough } from "stream";
import { once } from "events";
import type { ClientChannel, ExecOptions } from "ssh2";
import { SshShellChannel, SshShellTransport, type SshExecClient } from "../services/ssh-shell-channel.service.js";
import { TERMINAL_MODES } from "../services/multi-command-session.service.js";

/**
 * Remote end of an ssh2 channel: pushes play remote output, writes are recorded
 */
function createRemoteChannel() {
  const written: string[] = [];
  const remote = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  const stderr = new PassThrough();
  const close = vi.fn(() => {
    remote.destroy();
  });
  Object.assign(remote, { stderr, close });
  return { remote, stderr, close, written };
}

describe("SshShellChannel", () => {
  let remote: ReturnType<typeof createRemoteChannel>;
  let exec: Mock<SshExecClient["exec"]>;
  let channel: SshShellChannel;

  beforeEach(() => {
    remote = createRemoteChannel();
    exec = vi.fn<SshExecClient["exec"]>((_command, _options, callback) => {
      callback(undefined, remote.remote as unknown as ClientChannel);
    });
    channel = new SshShellChannel({ exec });
  });

  it("should send env and pty settings with the exec request", async () => {
    await channel.setEnv("LANG", "C");
    await channel.requestPty({ term: "xterm", rows: 24, columns: 80, modes: TERMINAL_MODES });

    await channel.start("/bin/bash");

    const expected: ExecOptions = {
      env: { LANG: "C" },
      pty: {
        term: "xterm",
        rows: 24,
        cols: 80,
        modes: { ECHO: 0, TTY_OP_ISPEED: 14400, TTY_OP_OSPEED: 14400 },
      },
    };
    expect(exec).toHaveBeenCalledWith("/bin/bash", expected, expect.any(Function));
  });

  it("should relay remote output and local input", async () => {
    const streams = channel.openStreams();
    await channel.start("/bin/bash");

    const stdoutData = once(streams.stdout, "data");
    remote.remote.push("$ ");
    expect(String((await stdoutData)[0])).toBe("$ ");

    const stderrData = once(streams.stderr, "data");
    remote.stderr.write("oops");
    expect(String((await stderrData)[0])).toBe("oops");

    streams.stdin.write("ls\n");
    await vi.waitFor(() => expect(remote.written).toEqual(["ls\n"]));
  });

  it("should reject when the exec request fails", async () => {
    exec.mockImplementation((_command, _options, callback) => {
      callback(new Error("channel open failure"), remote.remote as unknown as ClientChannel);
    });

    await expect(channel.start("/bin/bash")).rejects.toThrow("channel open failure");
  });

  it("should refuse to start twice", async () => {
    await channel.start("/bin/bash");

    await expect(channel.start("/bin/bash")).rejects.toThrow("Program already started on this channel");
  });

  it("should close the remote channel and end pending reads", async () => {
    const streams = channel.openStreams();
    await channel.start("/bin/bash");

    channel.close();
    channel.close();

    expect(remote.close).toHaveBeenCalledTimes(1);
    expect(streams.stdout.destroyed).toBe(true);
    expect(streams.stderr.destroyed).toBe(true);
    expect(streams.stdin.destroyed).toBe(true);
  });

  it("should refuse to start after close", async () => {
    channel.close();

    await expect(channel.start("/bin/bash")).rejects.toThrow("Channel is closed");
    expect(exec).not.toHaveBeenCalled();
  });
});

describe("SshShellTransport", () => {
  it("should open a fresh channel per call", async () => {
    const transport = new SshShellTransport({ exec: vi.fn() });

    const first = await transport.openChannel();
    const second = await transport.openChannel();

    expect(first).toBeInstanceOf(SshShellChannel);
    expect(first).not.toBe(second);
  });
});
