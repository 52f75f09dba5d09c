/**
 * Structured logger — subscribes to the event bus, writes JSON lines to stderr.
 *
 * Configure via environment:
 *   LOG_LEVEL=debug|info|warn|error  (default: info)
 *   LOG_FILE=/path/to/file           (optional, appends)
 *
 * `--debug` on the server command line overrides LOG_LEVEL.
 */

import { appendFile } from "node:fs/promises";
import { subscribe } from "./event-bus.js";
import { levelFor, type PortalEvent, type LogLevel } from "./events.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: number = LEVEL_ORDER.info;
let logFile: string | null = null;

export interface LoggerOptions {
  level?: LogLevel;
  file?: string | null;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function formatLine(event: PortalEvent, level: LogLevel): string {
  const { type, ...payload } = event;
  return JSON.stringify({ ts: new Date().toISOString(), level, type, ...payload });
}

function handleEvent(event: PortalEvent): void {
  const level = levelFor(event);
  if (LEVEL_ORDER[level] < minLevel) return;

  const line = formatLine(event, level);
  process.stderr.write(line + "\n");

  if (logFile) {
    appendFile(logFile, line + "\n").catch((err: unknown) => {
      // Don't recurse into emit() — report straight to stderr and drop the line
      process.stderr.write(`[logger] failed to append to ${logFile}: ${String(err)}\n`);
    });
  }
}

export function initLogger(options: LoggerOptions = {}): void {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");
  minLevel = LEVEL_ORDER[level];
  logFile = options.file !== undefined ? options.file : process.env.LOG_FILE || null;
  subscribe(handleEvent);
}

// Exported for testing
export { handleEvent as _handleEvent, formatLine as _formatLine, LEVEL_ORDER };
