import { describe, it, expect, vi } from "vitest";
import { TransportError } from "../server/errors.js";
import { Inbox } from "../server/inbox.js";
import { sendSession, type SessionView } from "./send-session.js";
import type { Compressor, FileSource, SenderChannel } from "./transmitter.js";

class FakeChannel implements SenderChannel {
  readonly inbox = new Inbox<string>();
  readonly sent: Array<string | Uint8Array> = [];
  bufferedAmount = 0;
  close = vi.fn();

  send(data: string | Uint8Array): void {
    this.sent.push(data);
  }

  receive(): Promise<string> {
    return this.inbox.next();
  }
}

function recordingView() {
  const calls: string[] = [];
  const view: SessionView = {
    begin: () => calls.push("begin"),
    finish: () => calls.push("finish"),
    status: (text) => calls.push(`status:${text}`),
    progress: (header, bytesRead) => calls.push(`progress:${header.name}:${bytesRead}`),
    persisted: (header) => calls.push(`persisted:${header.name}`),
  };
  return { view, calls };
}

const identity: Compressor = (input) => input;

function source(name: string, text: string): FileSource {
  const bytes = new TextEncoder().encode(text);
  return {
    name,
    size: bytes.byteLength,
    lastModified: 0,
    mime: "text/plain",
    async *stream() {
      yield bytes;
    },
  };
}

describe("sendSession", () => {
  it("sends everything, waits for confirmation and ends the session", async () => {
    const channel = new FakeChannel();
    channel.inbox.push("READY");
    channel.inbox.push("EOF");
    const { view, calls } = recordingView();

    await sendSession([source("a.txt", "abc")], { connect: async () => channel, compress: identity, view });

    expect(calls).toEqual([
      "begin",
      "status:",
      "progress:a.txt:3",
      "persisted:a.txt",
      "status:All files transferred.",
      "finish",
    ]);
    expect(channel.sent.at(-1)).toBe("EOT");
    expect(channel.close).not.toHaveBeenCalled();
  });

  it("unlocks the page when the connection cannot be opened", async () => {
    const { view, calls } = recordingView();
    const connect = () => Promise.reject(new TransportError("failed to connect to ws://portal.local/ws"));

    await expect(sendSession([source("a.txt", "abc")], { connect, compress: identity, view })).rejects.toBeInstanceOf(
      TransportError,
    );

    expect(calls).toEqual([
      "begin",
      "status:",
      "status:Transfer failed: failed to connect to ws://portal.local/ws",
      "finish",
    ]);
  });

  it("closes the channel when the server refuses a file", async () => {
    const channel = new FakeChannel();
    channel.inbox.push("path escapes destination root: ../x");
    const { view, calls } = recordingView();

    await expect(
      sendSession([source("../x", "abc")], { connect: async () => channel, compress: identity, view }),
    ).rejects.toThrow("unexpected message from peer: path escapes destination root: ../x");

    expect(channel.close).toHaveBeenCalledTimes(1);
    expect(calls.at(-2)).toBe("status:Transfer failed: unexpected message from peer: path escapes destination root: ../x");
    expect(calls.at(-1)).toBe("finish");
  });
});
