/**
 * ReceiverChannel over a `ws` WebSocket.
 *
 * Socket events are queued in an Inbox and pulled by the receiver one at a
 * time. When the receiver falls behind (slow disk), the socket is paused at
 * `highWater` queued messages and resumed once the queue is back under
 * `lowWater`, so TCP pushes back on the sender instead of memory growing.
 */

import WebSocket from "ws";
import { emit, errorDetail } from "./event-bus.js";
import { Inbox } from "./inbox.js";
import type { InboundMessage, ReceiverChannel } from "./receiver.js";

// Close reasons are limited to 123 bytes of UTF-8 (RFC 6455 §5.5)
const MAX_CLOSE_REASON_BYTES = 123;

export interface SocketChannelOptions {
  highWater?: number;
  lowWater?: number;
}

export function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export function truncateReason(reason: string): string {
  const bytes = Buffer.from(reason, "utf-8");
  if (bytes.length <= MAX_CLOSE_REASON_BYTES) return reason;
  // Drop a trailing partial code point rather than emit invalid UTF-8
  return bytes.subarray(0, MAX_CLOSE_REASON_BYTES).toString("utf-8").replace(/�+$/, "");
}

export class SocketChannel implements ReceiverChannel {
  private readonly inbox = new Inbox<InboundMessage>();
  private readonly highWater: number;
  private readonly lowWater: number;
  private paused = false;

  constructor(
    private readonly ws: WebSocket,
    options: SocketChannelOptions = {},
  ) {
    this.highWater = options.highWater ?? 64;
    this.lowWater = options.lowWater ?? Math.floor(this.highWater / 4);

    ws.on("message", (data, isBinary) => {
      this.inbox.push(
        isBinary
          ? { kind: "binary", data: toBuffer(data) }
          : { kind: "text", text: toBuffer(data).toString("utf-8") },
      );
      if (!this.paused && this.inbox.size >= this.highWater) {
        this.paused = true;
        ws.pause();
        emit({ type: "channel:pause", queued: this.inbox.size });
      }
    });

    ws.on("close", (code, reason) => {
      this.inbox.end({ kind: "closed", code, reason: reason.toString("utf-8") });
    });

    // "close" always follows "error"; just record why
    ws.on("error", (err) => {
      emit({ type: "channel:error", error: errorDetail(err) });
    });
  }

  async read(): Promise<InboundMessage> {
    const message = await this.inbox.next();
    if (this.paused && this.inbox.size <= this.lowWater) {
      this.paused = false;
      this.ws.resume();
      emit({ type: "channel:resume", queued: this.inbox.size });
    }
    return message;
  }

  send(text: string): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      emit({ type: "channel:send-error", error: `socket not open (readyState ${this.ws.readyState})` });
      return;
    }
    this.ws.send(text, (err) => {
      if (err) emit({ type: "channel:send-error", error: errorDetail(err) });
    });
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) return;
    this.ws.close(code, truncateReason(reason));
    // A paused socket never reads the peer's close reply
    if (this.paused) {
      this.paused = false;
      this.ws.resume();
      emit({ type: "channel:resume", queued: this.inbox.size });
    }
  }
}
