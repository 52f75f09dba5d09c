/**
 * Keeps the last CAPACITY events in memory for GET /status, queryable as a
 * whole or per session.
 */

import { subscribe, type PortalRecord } from "./event-bus.js";
import { levelFor, type LogLevel } from "./events.js";

export interface BufferEntry {
  ts: string;
  level: LogLevel;
  sessionId: string | null;
  event: PortalRecord;
}

const CAPACITY = 200;
let entries: BufferEntry[] = [];

function record(event: PortalRecord): void {
  entries.push({
    ts: new Date().toISOString(),
    level: levelFor(event),
    sessionId: event.sessionId ?? null,
    event,
  });
  if (entries.length > CAPACITY) entries = entries.slice(-CAPACITY);
}

/** Last `n` entries (all buffered when omitted), oldest first. */
export function getRecent(n: number = CAPACITY): BufferEntry[] {
  return n > 0 ? entries.slice(-n) : [];
}

/** Buffered entries for one session, oldest first. */
export function getSessionEvents(sessionId: string): BufferEntry[] {
  return entries.filter((entry) => entry.sessionId === sessionId);
}

/** Ids of sessions with anything still in the buffer, most recent last. */
export function bufferedSessions(): string[] {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (entry.sessionId === null) continue;
    seen.delete(entry.sessionId);
    seen.add(entry.sessionId);
  }
  return [...seen];
}

export function initStatusBuffer(): void {
  subscribe(record);
}

// Exported for testing
export { record as _handleEvent, CAPACITY };
