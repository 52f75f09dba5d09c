/**
 * Wire protocol primitives shared by the receiver (server) and the
 * transmitter (browser + CLI).
 *
 * Per file:   header (text) → READY ← → gzip frames (binary) → EOF → EOF ←
 * Per session: ... → EOT
 *
 * Every inbound text message is decoded against the control literals first;
 * what is left is a header or an error payload depending on the state of
 * whoever is reading it.
 */

import { HeaderError } from "./errors.js";

// -- Control tokens --

export const Signal = {
  Ready: "READY",
  EOF: "EOF",
  EOT: "EOT",
} as const;

export type Signal = (typeof Signal)[keyof typeof Signal];

const SIGNALS: ReadonlySet<string> = new Set<string>(Object.values(Signal));

export type ControlMessage =
  | { type: "signal"; signal: Signal }
  | { type: "text"; text: string };

function isSignal(text: string): text is Signal {
  return SIGNALS.has(text);
}

export function decodeControl(text: string): ControlMessage {
  return isSignal(text) ? { type: "signal", signal: text } : { type: "text", text };
}

// -- File header --

export interface FileHeader {
  /** Forward-slash relative path, non-empty. */
  name: string;
  /** Uncompressed length. Advisory only, never checked against the payload. */
  size: number;
  /** Epoch milliseconds; becomes the destination mtime. */
  lastModified: number;
  /** Advisory content type, only used for client-side icons. */
  mime: string;
}

export function encodeHeader(header: FileHeader): string {
  return JSON.stringify({
    name: header.name,
    size: header.size,
    lastModified: header.lastModified,
    mime: header.mime,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function integerField(raw: Record<string, unknown>, field: string): number {
  const value = raw[field];
  if (value === undefined || value === null) return 0;
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new HeaderError(`header field "${field}" must be an integer`);
  }
  return value;
}

/**
 * Parse a header text frame. Missing size/lastModified default to 0 and a
 * missing mime to "" (older clients don't send it); present fields of the
 * wrong type are rejected. Unknown fields are ignored.
 */
export function parseHeader(text: string): FileHeader {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new HeaderError("failed to parse header", { cause: err });
  }
  if (!isRecord(raw)) {
    throw new HeaderError("header must be a JSON object");
  }

  const { name, mime } = raw;
  if (typeof name !== "string" || name.length === 0) {
    throw new HeaderError("received invalid header: name must be a non-empty string");
  }
  if (mime !== undefined && mime !== null && typeof mime !== "string") {
    throw new HeaderError('header field "mime" must be a string');
  }

  return {
    name,
    size: integerField(raw, "size"),
    lastModified: integerField(raw, "lastModified"),
    mime: typeof mime === "string" ? mime : "",
  };
}
