/**
 * SenderChannel over the browser's WebSocket.
 */

import { TransportError } from "../server/errors.js";
import { Inbox } from "../server/inbox.js";
import type { SenderChannel } from "./transmitter.js";

type Inbound = { kind: "text"; text: string } | { kind: "closed"; error: TransportError };

/** ws(s)://<page host>/ws for the page that served this script. */
export function portalSocketUrl(pageUrl: string): string {
  const url = new URL(pageUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  url.pathname = "/ws";
  url.hash = "";
  url.search = "";
  return url.href;
}

export class BrowserChannel implements SenderChannel {
  private readonly inbox = new Inbox<Inbound>();

  private constructor(private readonly ws: WebSocket) {
    ws.binaryType = "arraybuffer";
    ws.onmessage = (event) => {
      if (typeof event.data === "string") {
        this.inbox.push({ kind: "text", text: event.data });
      }
      // The server never sends binary frames; ignore them
    };
    ws.onclose = (event) => {
      const reason = event.reason ? `: ${event.reason}` : "";
      this.inbox.end({
        kind: "closed",
        error: new TransportError(`connection closed (${event.code}${reason})`, event.code),
      });
    };
  }

  /** Connect and resolve once the socket is open. */
  static open(url: string): Promise<BrowserChannel> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      ws.onopen = () => {
        ws.onerror = null;
        resolve(new BrowserChannel(ws));
      };
      ws.onerror = () => {
        reject(new TransportError(`failed to connect to ${url}`));
      };
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
