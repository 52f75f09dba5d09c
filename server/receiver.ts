/**
 * Receiver engine — the server side of one transfer session.
 *
 * Strictly sequential: header → READY → payload frames → EOF → (drain) → EOF,
 * then the next header, until EOT or the channel closes. Any failure ends the
 * whole session; there is no skipping to the next file.
 */

import { mkdir, open, utimes, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { DecodePipeline } from "./decode-pipeline.js";
import {
  asTransferError,
  HeaderError,
  IOError,
  TransportError,
  type TransferError,
} from "./errors.js";
import { emit, errorDetail } from "./event-bus.js";
import type { SessionEndReason } from "./events.js";
import { resolveDestination } from "./path-guard.js";
import { decodeControl, parseHeader, Signal, type FileHeader } from "./protocol.js";

// -- Channel contract --

export type InboundMessage =
  | { kind: "text"; text: string }
  | { kind: "binary"; data: Uint8Array }
  | { kind: "closed"; code: number; reason: string };

export interface ReceiverChannel {
  /** Next inbound message; resolves `closed` (repeatedly) once the peer is gone. */
  read(): Promise<InboundMessage>;
  send(text: string): void;
  close(code: number, reason: string): void;
}

// -- Config & results --

export interface ReceiverConfig {
  /** Canonical absolute destination root (see canonicalizeRoot). */
  readonly root: string;
  /** Compressed bytes the decode hand-off holds before the read loop waits. */
  readonly pipeHighWaterMark?: number;
}

export type ReceiverState = "AwaitingHeader" | "AwaitingChunks" | "Draining" | "Done";

export interface SessionSummary {
  files: number;
  /** Decoded bytes written across all completed files. */
  bytes: number;
  reason: SessionEndReason;
  error?: TransferError;
}

type FileOutcome = "complete" | "eot";

function toIOError(message: string, options: ErrorOptions): TransferError {
  return new IOError(message, options);
}

export class Receiver {
  private _state: ReceiverState = "AwaitingHeader";
  private files = 0;
  private bytes = 0;

  constructor(
    private readonly channel: ReceiverChannel,
    private readonly config: ReceiverConfig,
  ) {}

  get state(): ReceiverState {
    return this._state;
  }

  /** Drive the session to completion. Never rejects; failures land in the summary. */
  async run(): Promise<SessionSummary> {
    try {
      const reason = await this.loop();
      emit({ type: "session:end", reason, files: this.files, bytes: this.bytes });
      return { files: this.files, bytes: this.bytes, reason };
    } catch (err) {
      const error = asTransferError(err, toIOError);
      this.setState("Done");
      emit({ type: "session:fail", kind: error.kind, error: errorDetail(error) });
      this.report(error);
      emit({ type: "session:end", reason: "error", files: this.files, bytes: this.bytes });
      return { files: this.files, bytes: this.bytes, reason: "error", error };
    }
  }

  private async loop(): Promise<"eot" | "closed"> {
    for (;;) {
      const message = await this.channel.read();

      if (message.kind === "closed") {
        this.setState("Done");
        return "closed";
      }
      if (message.kind === "binary") {
        throw new HeaderError("expected header, received binary frame");
      }

      const control = decodeControl(message.text);
      if (control.type === "signal") {
        if (control.signal === Signal.EOT) {
          this.setState("Done");
          return "eot";
        }
        throw new HeaderError(`expected header, received ${control.signal}`);
      }

      if ((await this.receiveFile(parseHeader(control.text))) === "eot") {
        this.setState("Done");
        return "eot";
      }
    }
  }

  private async receiveFile(header: FileHeader): Promise<FileOutcome> {
    emit({ type: "header:received", name: header.name, size: header.size, mime: header.mime });

    const path = resolveDestination(this.config.root, header.name);
    const handle = await this.openDestination(path);
    const sink = handle.createWriteStream();
    const pipeline = new DecodePipeline(sink, this.config.pipeHighWaterMark);
    const startedAt = Date.now();

    this.channel.send(Signal.Ready);
    this.setState("AwaitingChunks");

    let outcome: FileOutcome;
    try {
      outcome = await this.pump(pipeline);
    } catch (err) {
      await pipeline.abort(asTransferError(err, toIOError));
      throw err;
    }

    if (outcome === "eot") {
      // Peer ended the session mid-file; the partial file stays on disk
      emit({ type: "file:partial", path, received: pipeline.received });
      return "eot";
    }

    await this.applyMtime(path, header.lastModified);
    this.channel.send(Signal.EOF);
    this.files++;
    this.bytes += sink.bytesWritten;
    emit({ type: "file:complete", path, bytes: sink.bytesWritten, durationMs: Date.now() - startedAt });
    this.setState("AwaitingHeader");
    return "complete";
  }

  /** Forward payload frames until EOF (drained) or EOT. */
  private async pump(pipeline: DecodePipeline): Promise<FileOutcome> {
    for (;;) {
      const message = await this.channel.read();

      if (message.kind === "binary") {
        await pipeline.write(message.data);
        continue;
      }
      if (message.kind === "closed") {
        const reason = message.reason ? `: ${message.reason}` : "";
        throw new TransportError(`channel closed mid-file (${message.code}${reason})`, message.code);
      }

      const control = decodeControl(message.text);
      if (control.type === "signal" && control.signal === Signal.EOF) {
        this.setState("Draining");
        await pipeline.finish();
        return "complete";
      }
      if (control.type === "signal" && control.signal === Signal.EOT) {
        await pipeline.abort(new IOError("session ended before end of file"));
        return "eot";
      }
      throw new IOError(`invalid framing: unexpected text message ${JSON.stringify(message.text)}`);
    }
  }

  private async openDestination(path: string): Promise<FileHandle> {
    try {
      await mkdir(dirname(path), { recursive: true });
      const handle = await open(path, "w");
      emit({ type: "file:open", path });
      return handle;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new IOError(`failed to create file ${path}: ${detail}`, { cause: err });
    }
  }

  private async applyMtime(path: string, lastModified: number): Promise<void> {
    const mtime = new Date(lastModified);
    try {
      await utimes(path, mtime, mtime);
    } catch (err) {
      emit({ type: "file:mtime-error", path, error: errorDetail(err) });
    }
  }

  /** Best-effort: tell the peer why, then close. A dead channel gets nothing. */
  private report(error: TransferError): void {
    if (error instanceof TransportError) return;
    this.channel.send(error.message);
    this.channel.close(error.closeCode, error.message);
  }

  private setState(next: ReceiverState): void {
    if (next === this._state) return;
    emit({ type: "session:state", from: this._state, to: next });
    this._state = next;
  }
}
