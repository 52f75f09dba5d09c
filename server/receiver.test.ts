import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { Inbox } from "./inbox.js";
import { canonicalizeRoot } from "./path-guard.js";
import { encodeHeader, type FileHeader } from "./protocol.js";
import { Receiver, type InboundMessage, type ReceiverChannel } from "./receiver.js";

// -- Scripted channel --

class ScriptedChannel implements ReceiverChannel {
  readonly inbox = new Inbox<InboundMessage>();
  readonly sent: string[] = [];
  readonly closes: Array<{ code: number; reason: string }> = [];

  read(): Promise<InboundMessage> {
    return this.inbox.next();
  }

  send(text: string): void {
    this.sent.push(text);
  }

  close(code: number, reason: string): void {
    this.closes.push({ code, reason });
  }

  text(text: string): this {
    this.inbox.push({ kind: "text", text });
    return this;
  }

  binary(data: Uint8Array): this {
    this.inbox.push({ kind: "binary", data });
    return this;
  }

  header(header: Partial<FileHeader> & { name: string }): this {
    return this.text(encodeHeader({ size: 0, lastModified: 0, mime: "", ...header }));
  }

  /** Header, gzip payload in two frames, EOF. */
  file(name: string, content: string, lastModified = 0): this {
    const compressed = gzipSync(Buffer.from(content));
    const cut = Math.floor(compressed.length / 2);
    return this.header({ name, size: Buffer.byteLength(content), lastModified })
      .binary(compressed.subarray(0, cut))
      .binary(compressed.subarray(cut))
      .text("EOF");
  }

  closed(code = 1006, reason = ""): void {
    this.inbox.end({ kind: "closed", code, reason });
  }
}

describe("Receiver", () => {
  let root: string;

  beforeEach(async () => {
    root = await canonicalizeRoot(await mkdtemp(join(tmpdir(), "portal-recv-")));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function run(channel: ScriptedChannel) {
    return new Receiver(channel, { root }).run();
  }

  it("writes a nested file, sets its mtime and acknowledges it", async () => {
    const channel = new ScriptedChannel().file("docs/a.txt", "hello world", 1700000000000).text("EOT");

    const summary = await run(channel);

    expect(summary).toEqual({ files: 1, bytes: 11, reason: "eot" });
    expect(channel.sent).toEqual(["READY", "EOF"]);
    expect(channel.closes).toEqual([]);
    const path = join(root, "docs", "a.txt");
    expect(await readFile(path, "utf-8")).toBe("hello world");
    expect(Math.round((await stat(path)).mtimeMs)).toBe(1700000000000);
  });

  it("handles several files in one session", async () => {
    const channel = new ScriptedChannel()
      .file("one.txt", "first")
      .file("two/two.txt", "second file")
      .file("empty.txt", "")
      .text("EOT");

    const summary = await run(channel);

    expect(summary).toEqual({ files: 3, bytes: 16, reason: "eot" });
    expect(channel.sent).toEqual(["READY", "EOF", "READY", "EOF", "READY", "EOF"]);
    expect(await readFile(join(root, "one.txt"), "utf-8")).toBe("first");
    expect(await readFile(join(root, "two", "two.txt"), "utf-8")).toBe("second file");
    expect(await readFile(join(root, "empty.txt"), "utf-8")).toBe("");
  });

  it("truncates an existing file", async () => {
    await writeFile(join(root, "a.txt"), "a much longer previous version");
    const channel = new ScriptedChannel().file("a.txt", "short").text("EOT");

    await run(channel);

    expect(await readFile(join(root, "a.txt"), "utf-8")).toBe("short");
  });

  it("ends quietly when the peer closes between files", async () => {
    const channel = new ScriptedChannel().file("a.txt", "x");
    channel.closed(1000);

    const summary = await run(channel);

    expect(summary).toEqual({ files: 1, bytes: 1, reason: "closed" });
    expect(channel.closes).toEqual([]);
  });

  it("rejects a path escaping the root with a policy close", async () => {
    const channel = new ScriptedChannel().header({ name: "../escape.txt" });

    const summary = await run(channel);

    expect(summary.reason).toBe("error");
    expect(summary.error?.kind).toBe("path");
    expect(channel.sent).toEqual(["path escapes destination root: ../escape.txt"]);
    expect(channel.closes).toEqual([{ code: 1008, reason: "path escapes destination root: ../escape.txt" }]);
    await expect(stat(join(root, "..", "escape.txt"))).rejects.toThrow();
  });

  it("rejects a binary frame where a header is expected", async () => {
    const channel = new ScriptedChannel().binary(new Uint8Array([1, 2, 3]));

    const summary = await run(channel);

    expect(summary.error?.kind).toBe("header");
    expect(channel.sent).toEqual(["expected header, received binary frame"]);
    expect(channel.closes[0].code).toBe(1002);
  });

  it("rejects a control literal where a header is expected", async () => {
    const channel = new ScriptedChannel().text("READY");

    const summary = await run(channel);

    expect(summary.error?.kind).toBe("header");
    expect(channel.sent).toEqual(["expected header, received READY"]);
  });

  it("rejects malformed header JSON", async () => {
    const channel = new ScriptedChannel().text("{nope");

    const summary = await run(channel);

    expect(channel.sent).toEqual(["failed to parse header"]);
    expect(channel.closes).toEqual([{ code: 1002, reason: "failed to parse header" }]);
    expect(summary.files).toBe(0);
  });

  it("fails with a decode error on a corrupt payload", async () => {
    const channel = new ScriptedChannel()
      .header({ name: "bad.bin" })
      .binary(Buffer.from("definitely not gzip"))
      .text("EOF");

    const summary = await run(channel);

    expect(summary.error?.kind).toBe("decode");
    expect(channel.sent[0]).toBe("READY");
    expect(channel.sent).toHaveLength(2);
    expect(channel.sent[1]).toMatch(/^failed to decode payload: /);
    expect(channel.closes[0].code).toBe(1011);
  });

  it("treats stray text mid-file as an I/O framing error", async () => {
    const channel = new ScriptedChannel().header({ name: "a.txt" }).text("hello");

    const summary = await run(channel);

    expect(summary.error?.kind).toBe("io");
    expect(channel.sent).toEqual(["READY", 'invalid framing: unexpected text message "hello"']);
    expect(channel.closes[0].code).toBe(1011);
  });

  it("reports nothing to a peer that vanished mid-file", async () => {
    const compressed = gzipSync(Buffer.from("partial content"));
    const channel = new ScriptedChannel().header({ name: "p.txt" }).binary(compressed.subarray(0, 6));
    channel.closed(1006);

    const summary = await run(channel);

    expect(summary.reason).toBe("error");
    expect(summary.error?.kind).toBe("transport");
    expect(channel.sent).toEqual(["READY"]);
    expect(channel.closes).toEqual([]);
  });

  it("keeps the partial file when the session ends mid-file", async () => {
    const compressed = gzipSync(Buffer.from("partial content"));
    const channel = new ScriptedChannel()
      .header({ name: "p.txt" })
      .binary(compressed.subarray(0, 6))
      .text("EOT");

    const summary = await run(channel);

    expect(summary).toEqual({ files: 0, bytes: 0, reason: "eot" });
    expect(channel.sent).toEqual(["READY"]);
    expect((await stat(join(root, "p.txt"))).isFile()).toBe(true);
  });

  it("fails with an I/O error when the destination cannot be created", async () => {
    await writeFile(join(root, "blocker"), "i am a file");
    const channel = new ScriptedChannel().header({ name: "blocker/x.txt" });

    const summary = await run(channel);

    expect(summary.error?.kind).toBe("io");
    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0]).toMatch(/^failed to create file /);
    expect(channel.closes[0].code).toBe(1011);
  });

  it("ends in Done", async () => {
    const channel = new ScriptedChannel().text("EOT");
    const receiver = new Receiver(channel, { root });
    expect(receiver.state).toBe("AwaitingHeader");

    expect(await receiver.run()).toEqual({ files: 0, bytes: 0, reason: "eot" });
    expect(receiver.state).toBe("Done");
  });
});
