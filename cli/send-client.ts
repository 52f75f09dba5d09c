/**
 * send-client.ts — Node side of the portal sender.
 *
 * Same Transmitter as the browser page, plugged into a `ws` socket, zlib
 * gzip and files read from disk. portal-send.ts adds the terminal output.
 */

import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { basename, extname, join, relative, resolve, sep } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import WebSocket from "ws";

import { TransportError } from "../server/errors.js";
import { Inbox } from "../server/inbox.js";
import type { FileHeader } from "../server/protocol.js";
import {
  Transmitter,
  type Compressor,
  type FileSource,
  type SenderChannel,
  type SenderState,
} from "../src/transmitter.js";

// -- Compression --

export const gzipChunks: Compressor = async function* (input) {
  const gzip = createGzip();
  // Settles with the failure (or null) so an early exit can't leave it unhandled
  const pumped = pipeline(Readable.from(input), gzip).then(
    () => null,
    (err: unknown) => err,
  );
  for await (const chunk of gzip) {
    if (chunk instanceof Uint8Array) yield chunk;
  }
  const failure = await pumped;
  if (failure !== null) throw failure;
};

// -- Channel --

type Inbound = { kind: "text"; text: string } | { kind: "closed"; error: TransportError };

export class SocketSenderChannel implements SenderChannel {
  private readonly inbox = new Inbox<Inbound>();

  private constructor(private readonly ws: WebSocket) {
    ws.on("message", (data, isBinary) => {
      if (isBinary) return; // the server only speaks text
      this.inbox.push({ kind: "text", text: data.toString() });
    });
    ws.on("close", (code, reason) => {
      const detail = reason.length > 0 ? `: ${reason.toString("utf-8")}` : "";
      this.inbox.end({ kind: "closed", error: new TransportError(`connection closed (${code}${detail})`, code) });
    });
  }

  static open(url: string): Promise<SocketSenderChannel> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      const onError = (err: Error): void => {
        reject(new TransportError(`failed to connect to ${url}: ${err.message}`, undefined, { cause: err }));
      };
      ws.once("error", onError);
      ws.once("open", () => {
        ws.off("error", onError);
        // "close" follows any later error and ends the inbox
        ws.on("error", () => undefined);
        resolve(new SocketSenderChannel(ws));
      });
    });
  }

  get bufferedAmount(): number {
    return this.ws.bufferedAmount;
  }

  send(data: string | Uint8Array): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new TransportError("connection is not open");
    }
    this.ws.send(data);
  }

  async receive(): Promise<string> {
    const message = await this.inbox.next();
    if (message.kind === "closed") throw message.error;
    return message.text;
  }

  close(code = 1000, reason?: string): void {
    this.ws.close(code, reason);
  }
}

// -- Files on disk --

const MIME_TYPES: Record<string, string> = {
  ".txt": "text/plain", ".md": "text/markdown", ".html": "text/html",
  ".css": "text/css", ".csv": "text/csv", ".js": "text/javascript",
  ".json": "application/json", ".pdf": "application/pdf", ".zip": "application/zip",
  ".png": "image/png", ".jpg": "image/jpeg", ".jpeg": "image/jpeg",
  ".gif": "image/gif", ".webp": "image/webp", ".svg": "image/svg+xml",
  ".mp3": "audio/mpeg", ".wav": "audio/wav", ".mp4": "video/mp4",
};

export function guessMime(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

export interface LocalFile {
  path: string;
  /** Name sent in the header: forward slashes, relative. */
  name: string;
}

function toPortalName(path: string): string {
  return path.split(sep).join("/");
}

async function* walkDirectory(dir: string, base: string): AsyncGenerator<LocalFile> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkDirectory(path, base);
    } else if (entry.isFile()) {
      yield { path, name: toPortalName(relative(base, path)) };
    }
  }
}

/**
 * Expand command-line paths into files. A directory `photos` yields
 * `photos/...` names, like a folder dropped on the page; a plain file is
 * sent under its basename.
 */
export async function* enumerateFiles(paths: string[]): AsyncGenerator<LocalFile> {
  for (const input of paths) {
    const path = resolve(input);
    const info = await stat(path);
    if (info.isDirectory()) {
      yield* walkDirectory(path, join(path, ".."));
    } else {
      yield { path, name: basename(path) };
    }
  }
}

export async function diskSource(file: LocalFile): Promise<FileSource> {
  const info = await stat(file.path);
  return {
    name: file.name,
    size: info.size,
    lastModified: Math.floor(info.mtimeMs),
    mime: guessMime(file.path),
    stream: () => createReadStream(file.path),
  };
}

// -- Session --

export interface SendCallbacks {
  onStart?(header: FileHeader): void;
  onProgress?(header: FileHeader, bytesRead: number): void;
  onSent?(header: FileHeader): void;
  onPersisted?(header: FileHeader): void;
  onStateChange?(state: SenderState): void;
}

export interface SendOptions {
  bufferedThreshold?: number;
  callbacks?: SendCallbacks;
}

export interface SendSummary {
  files: number;
  bytes: number;
}

/** Send every file under `paths` in one session, wait for all acks, then EOT. */
export async function sendPaths(url: string, paths: string[], options: SendOptions = {}): Promise<SendSummary> {
  const cb = options.callbacks ?? {};
  const channel = await SocketSenderChannel.open(url);
  const transmitter = new Transmitter(channel, {
    compress: gzipChunks,
    bufferedThreshold: options.bufferedThreshold,
    onStateChange: cb.onStateChange,
    onProgress: cb.onProgress,
    onPersisted: cb.onPersisted,
  });

  const summary: SendSummary = { files: 0, bytes: 0 };
  try {
    for await (const file of enumerateFiles(paths)) {
      const source = await diskSource(file);
      cb.onStart?.({ name: source.name, size: source.size, lastModified: source.lastModified, mime: source.mime });
      const header = await transmitter.transmit(source);
      cb.onSent?.(header);
      summary.files++;
      summary.bytes += header.size;
    }
    await transmitter.flush();
    transmitter.end();
    channel.close(1000);
    return summary;
  } catch (err) {
    channel.close(1000);
    throw err;
  }
}
