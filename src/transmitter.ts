/**
 * Transmitter — the sending side of a portal session.
 *
 * One file in flight at a time (availability gate). Per file:
 *   header → wait READY → gzip frames (with buffered-bytes backpressure) → EOF
 * The gate is released as soon as EOF is sent; the server's EOF reply
 * (persisted on disk) is consumed later, while waiting for the next READY or
 * in flush().
 *
 * Environment-agnostic: the browser and the CLI plug in their own channel
 * and compressor.
 */

import {
  asTransferError,
  ProtocolError,
  TransportError,
  type TransferError,
} from "../server/errors.js";
import { decodeControl, encodeHeader, Signal, type FileHeader } from "../server/protocol.js";
import { AvailabilityGate } from "./gate.js";

// -- Contracts --

export interface SenderChannel {
  send(data: string | Uint8Array): void;
  /** Bytes queued by send() but not yet handed to the network. */
  readonly bufferedAmount: number;
  /** Next inbound text message. Rejects with TransportError once the channel is gone. */
  receive(): Promise<string>;
  close(code?: number, reason?: string): void;
}

/** A file to send: metadata plus its raw (uncompressed) bytes. */
export interface FileSource {
  /** Default relative path when transmit() isn't given one. */
  readonly name: string;
  readonly size: number;
  readonly lastModified: number;
  readonly mime: string;
  stream(): AsyncIterable<Uint8Array>;
}

/** Streaming encoder; both ends agree on gzip. */
export type Compressor = (input: AsyncIterable<Uint8Array>) => AsyncIterable<Uint8Array>;

export type SenderState = "Idle" | "AwaitingReady" | "Streaming" | "AwaitingAck";

export interface TransmitterOptions {
  compress: Compressor;
  /** Suspend sends while more than this many bytes are buffered. Default 2 MiB. */
  bufferedThreshold?: number;
  /** Re-poll interval while suspended. Default 50 ms. */
  pollIntervalMs?: number;
  onStateChange?: (state: SenderState) => void;
  /** Raw bytes read from the source so far. */
  onProgress?: (header: FileHeader, bytesRead: number) => void;
  /** Server confirmed the file is on disk. */
  onPersisted?: (header: FileHeader) => void;
}

export const DEFAULT_BUFFERED_THRESHOLD = 2 * 1024 * 1024;
export const DEFAULT_POLL_INTERVAL_MS = 50;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toTransportError(message: string, options: ErrorOptions): TransferError {
  return new TransportError(message, undefined, options);
}

export function headerFor(file: FileSource, name: string): FileHeader {
  return { name, size: file.size, lastModified: file.lastModified, mime: file.mime };
}

async function* counted(
  source: AsyncIterable<Uint8Array>,
  onRead: (total: number) => void,
): AsyncIterable<Uint8Array> {
  let total = 0;
  for await (const chunk of source) {
    total += chunk.byteLength;
    onRead(total);
    yield chunk;
  }
}

export class Transmitter {
  private readonly gate = new AvailabilityGate();
  private readonly unacknowledged: FileHeader[] = [];
  private readonly threshold: number;
  private readonly pollMs: number;
  private _state: SenderState = "Idle";
  private ended = false;

  constructor(
    private readonly channel: SenderChannel,
    private readonly options: TransmitterOptions,
  ) {
    this.threshold = options.bufferedThreshold ?? DEFAULT_BUFFERED_THRESHOLD;
    this.pollMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  get state(): SenderState {
    return this._state;
  }

  /** Files whose EOF was sent but not yet confirmed by the server. */
  get pending(): number {
    return this.unacknowledged.length;
  }

  /**
   * Send one file. Resolves once its EOF is on the channel (not when the
   * server has persisted it — see onPersisted / flush()).
   */
  async transmit(file: FileSource, name: string = file.name): Promise<FileHeader> {
    const release = await this.gate.acquire();
    try {
      if (this.ended) throw new ProtocolError(Signal.EOT, "session already ended");

      const header = headerFor(file, name);
      this.channel.send(encodeHeader(header));
      this.setState("AwaitingReady");
      await this.awaitReady();

      this.setState("Streaming");
      const raw = counted(file.stream(), (total) => this.options.onProgress?.(header, total));
      for await (const frame of this.options.compress(raw)) {
        if (frame.byteLength === 0) continue;
        await this.admit();
        this.channel.send(frame);
      }

      this.channel.send(Signal.EOF);
      this.unacknowledged.push(header);
      this.setState("AwaitingAck");
      return header;
    } catch (err) {
      this.setState("Idle");
      throw asTransferError(err, toTransportError);
    } finally {
      release();
    }
  }

  /** Wait until the server has confirmed every file sent so far. */
  async flush(): Promise<void> {
    const release = await this.gate.acquire();
    try {
      while (this.unacknowledged.length > 0) {
        const text = await this.channel.receive();
        const control = decodeControl(text);
        if (control.type !== "signal" || control.signal !== Signal.EOF) {
          throw new ProtocolError(text);
        }
        this.acknowledge();
      }
    } catch (err) {
      this.setState("Idle");
      throw asTransferError(err, toTransportError);
    } finally {
      release();
    }
  }

  /** End the session. No reply is expected. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.channel.send(Signal.EOT);
  }

  private async awaitReady(): Promise<void> {
    for (;;) {
      const text = await this.channel.receive();
      const control = decodeControl(text);
      if (control.type === "signal" && control.signal === Signal.Ready) return;
      // A late persistence ack for an earlier file
      if (control.type === "signal" && control.signal === Signal.EOF && this.unacknowledged.length > 0) {
        this.acknowledge();
        continue;
      }
      throw new ProtocolError(text);
    }
  }

  private acknowledge(): void {
    const header = this.unacknowledged.shift();
    if (header) this.options.onPersisted?.(header);
    if (this.unacknowledged.length === 0 && this._state === "AwaitingAck") this.setState("Idle");
  }

  /** Admission control: hold the next frame while the channel is backed up. */
  private async admit(): Promise<void> {
    while (this.channel.bufferedAmount > this.threshold) {
      await delay(this.pollMs);
    }
  }

  private setState(next: SenderState): void {
    if (next === this._state) return;
    this._state = next;
    this.options.onStateChange?.(next);
  }
}
