/**
 * In-process event bus. Business logic calls emit(); the logger and the
 * status buffer subscribe. Events emitted inside a session arrive tagged
 * with its id.
 */

import type { PortalEvent } from "./events.js";
import { currentSession } from "./session-context.js";

/** An event as observers see it. */
export type PortalRecord = PortalEvent & { readonly sessionId?: string };

export type PortalListener = (record: PortalRecord) => void;

const listeners = new Set<PortalListener>();

export function emit(event: PortalEvent): void {
  const session = currentSession();
  const record: PortalRecord = session ? { ...event, sessionId: session.sessionId } : event;
  // Snapshot: a listener may unsubscribe while we iterate
  for (const listener of [...listeners]) {
    try {
      listener(record);
    } catch (err) {
      console.error("[event-bus] subscriber threw:", err);
    }
  }
}

/** Returns the matching unsubscribe. Subscribing the same function twice is a no-op. */
export function subscribe(listener: PortalListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/** Stack when there is one, for log lines. */
export function errorDetail(err: unknown): string {
  return err instanceof Error ? err.stack || String(err) : String(err);
}
