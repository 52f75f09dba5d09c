/**
 * Portal HTTP server.
 *
 * WebSocket:  GET /ws      — one transfer session per connection
 * Debug:      GET /status  — uptime, live sessions, recent events
 *             GET /status?session=<id> — one session's buffered events
 * Static:     GET /*       — built browser client (dist/client)
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { readFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import WebSocket, { WebSocketServer } from "ws";

import { emit } from "./event-bus.js";
import { PathViolation } from "./errors.js";
import { resolveDestination } from "./path-guard.js";
import { Receiver, type ReceiverConfig, type SessionSummary } from "./receiver.js";
import { withSession } from "./session-context.js";
import { SocketChannel } from "./socket-channel.js";
import { bufferedSessions, getRecent, getSessionEvents } from "./status-buffer.js";

const HERE = dirname(fileURLToPath(import.meta.url));
// server/ under tsx, dist/server/ once built
const PROJECT_ROOT = basename(join(HERE, "..")) === "dist" ? join(HERE, "../..") : join(HERE, "..");
export const DEFAULT_CLIENT_DIR = join(PROJECT_ROOT, "dist", "client");

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".js": "application/javascript",
  ".css": "text/css",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".ico": "image/x-icon",
  ".json": "application/json",
  ".map": "application/json",
};

export interface PortalServerOptions extends ReceiverConfig {
  /** Directory holding the built client. */
  clientDir?: string;
}

export interface PortalServer {
  readonly http: Server;
  readonly wss: WebSocketServer;
  /** Sessions currently running. */
  readonly activeSessions: number;
  listen(port: number, host?: string): Promise<AddressInfo>;
  close(): Promise<void>;
}

async function serveStatic(clientDir: string, pathname: string, res: ServerResponse): Promise<boolean> {
  const relative = pathname === "/" ? "index.html" : decodeURIComponent(pathname.slice(1));
  let file: string;
  try {
    // Same containment rule as uploads: nothing above the client dir
    file = resolveDestination(clientDir, relative);
  } catch (err) {
    if (err instanceof PathViolation) return false;
    throw err;
  }
  try {
    const content = await readFile(file);
    res.writeHead(200, {
      "Content-Type": CONTENT_TYPES[extname(file)] ?? "application/octet-stream",
      "Cache-Control": "no-cache",
    });
    res.end(content);
    return true;
  } catch {
    // Missing or unreadable asset → 404
    return false;
  }
}

export function createPortalServer(options: PortalServerOptions): PortalServer {
  const receiverConfig: ReceiverConfig = Object.freeze({
    root: options.root,
    pipeHighWaterMark: options.pipeHighWaterMark,
  });
  const clientDir = options.clientDir ?? DEFAULT_CLIENT_DIR;
  const running = new Set<Promise<SessionSummary>>();
  const startedAt = Date.now();

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<number> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method !== "GET" && req.method !== "HEAD") {
      res.writeHead(405, { Allow: "GET, HEAD" }).end();
      return 405;
    }

    if (url.pathname === "/status") {
      // ?session=<id> narrows the event list to one session
      const sessionId = url.searchParams.get("session");
      const body = sessionId === null
        ? {
            uptimeMs: Date.now() - startedAt,
            root: receiverConfig.root,
            sessions: running.size,
            recentSessions: bufferedSessions(),
            recentEvents: getRecent(50),
          }
        : { sessionId, events: getSessionEvents(sessionId) };
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(body));
      return 200;
    }

    if (url.pathname === "/ws") {
      res.writeHead(426, { "Content-Type": "text/plain" }).end("Upgrade Required");
      return 426;
    }

    if (await serveStatic(clientDir, url.pathname, res)) return 200;

    res.writeHead(404, { "Content-Type": "text/plain" }).end("Not Found");
    return 404;
  }

  const http = createServer((req, res) => {
    const start = Date.now();
    handleRequest(req, res).then(
      (status) => {
        emit({ type: "request:http", method: req.method ?? "", url: req.url ?? "", status, durationMs: Date.now() - start });
      },
      (err: unknown) => {
        emit({ type: "request:rejected", reason: String(err), method: req.method ?? "", url: req.url ?? "" });
        if (!res.headersSent) res.writeHead(500);
        res.end();
      },
    );
  });

  // Any origin may connect; the hosting environment owns access control
  const wss = new WebSocketServer({ noServer: true });

  http.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname !== "/ws") {
      emit({ type: "request:rejected", reason: "upgrade outside /ws", method: req.method ?? "", url: req.url ?? "" });
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => wss.emit("connection", ws, req));
  });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    withSession(req.socket.remoteAddress ?? null, ({ remote }) => {
      emit({ type: "session:open", remote });
      const receiver = new Receiver(new SocketChannel(ws), receiverConfig);
      // run() never rejects — failures are reported inside the session
      const session = receiver.run().finally(() => {
        running.delete(session);
        if (ws.readyState === WebSocket.OPEN) ws.close(1000);
      });
      running.add(session);
    });
  });

  return {
    http,
    wss,
    get activeSessions() {
      return running.size;
    },
    listen(port, host) {
      return new Promise((resolve, reject) => {
        http.once("error", reject);
        http.listen(port, host, () => {
          http.off("error", reject);
          const address = http.address();
          if (address === null || typeof address === "string") {
            reject(new Error("server is not listening on a TCP port"));
            return;
          }
          resolve(address);
        });
      });
    },
    async close() {
      for (const client of wss.clients) client.terminate();
      await Promise.allSettled(running);
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => http.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
