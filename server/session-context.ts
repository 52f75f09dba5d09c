/**
 * Which transfer session the current async call chain belongs to.
 *
 * The upgrade handler runs each Receiver inside withSession(); emit() reads
 * currentSession() to tag events, so nothing below it passes ids around.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export interface SessionInfo {
  /** 8 hex chars, unique enough to grep one session out of the log. */
  readonly sessionId: string;
  readonly remote: string | null;
  readonly startedAt: number;
}

const storage = new AsyncLocalStorage<SessionInfo>();

export function newSessionId(): string {
  return randomBytes(4).toString("hex");
}

export function withSession<T>(
  remote: string | null,
  fn: (session: SessionInfo) => T,
  sessionId: string = newSessionId(),
): T {
  const session: SessionInfo = Object.freeze({ sessionId, remote, startedAt: Date.now() });
  return storage.run(session, () => fn(session));
}

export function currentSession(): SessionInfo | undefined {
  return storage.getStore();
}
