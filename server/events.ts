/**
 * Typed portal events — the contract between business logic and observers.
 *
 * Business logic calls emit(event). Subscribers (logger, status buffer)
 * consume events without coupling to the emitter. Each variant is narrowable
 * via its `type` field.
 */

import type { TransferErrorKind } from "./errors.js";
import type { ReceiverState } from "./receiver.js";

// -- Severity levels (used by logger subscriber to filter) --

export type LogLevel = "debug" | "info" | "warn" | "error";

export type SessionEndReason = "eot" | "closed" | "error";

// -- Event variants --

export type PortalEvent =
  // Session lifecycle
  | { type: "session:open"; remote: string | null }
  | { type: "session:state"; from: ReceiverState; to: ReceiverState }
  | { type: "session:end"; reason: SessionEndReason; files: number; bytes: number }
  | { type: "session:fail"; kind: TransferErrorKind; error: string }

  // Per-file transfer
  | { type: "header:received"; name: string; size: number; mime: string }
  | { type: "file:open"; path: string }
  | { type: "file:complete"; path: string; bytes: number; durationMs: number }
  | { type: "file:partial"; path: string; received: number }
  | { type: "file:mtime-error"; path: string; error: string }

  // Channel
  | { type: "channel:pause"; queued: number }
  | { type: "channel:resume"; queued: number }
  | { type: "channel:send-error"; error: string }
  | { type: "channel:error"; error: string }

  // Request handling
  | { type: "request:http"; method: string; url: string; status: number; durationMs: number }
  | { type: "request:rejected"; reason: string; method: string; url: string }

  // Server lifecycle
  | { type: "server:start"; port: number; root: string; urls: string[] }
  | { type: "server:shutdown"; signal: string }
  | { type: "server:shutdown-complete" }
  | { type: "server:uncaught-exception"; error: string }
  | { type: "server:unhandled-rejection"; error: string };

// -- Level mapping --

const LEVEL_MAP: Record<PortalEvent["type"], LogLevel> = {
  "session:open": "info",
  "session:state": "debug",
  "session:end": "info",
  "session:fail": "error",
  "header:received": "debug",
  "file:open": "debug",
  "file:complete": "info",
  "file:partial": "warn",
  "file:mtime-error": "warn",
  "channel:pause": "debug",
  "channel:resume": "debug",
  "channel:send-error": "warn",
  "channel:error": "warn",
  "request:http": "debug",
  "request:rejected": "warn",
  "server:start": "info",
  "server:shutdown": "info",
  "server:shutdown-complete": "info",
  "server:uncaught-exception": "error",
  "server:unhandled-rejection": "error",
};

export function levelFor(event: PortalEvent): LogLevel {
  return LEVEL_MAP[event.type];
}
