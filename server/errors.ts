/**
 * Transfer error taxonomy.
 *
 * Every failure inside a session is one of these. All of them end the
 * session: the receiver reports the message to the peer (text frame, then a
 * close frame with `closeCode`) and stops reading.
 *
 * No Node imports — the browser sender shares this module.
 */

export type TransferErrorKind =
  | "header"
  | "path"
  | "io"
  | "decode"
  | "protocol"
  | "transport";

// WebSocket close codes (RFC 6455 §7.4.1)
export const CLOSE_PROTOCOL_ERROR = 1002;
export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_INTERNAL_ERROR = 1011;
export const CLOSE_ABNORMAL = 1006; // reserved: observed locally, never sent

export abstract class TransferError extends Error {
  abstract readonly kind: TransferErrorKind;
  abstract readonly closeCode: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Header text was not a valid FileHeader (bad JSON, empty name, wrong types). */
export class HeaderError extends TransferError {
  readonly kind = "header";
  readonly closeCode = CLOSE_PROTOCOL_ERROR;
}

/** Destination would land outside the configured root. */
export class PathViolation extends TransferError {
  readonly kind = "path";
  readonly closeCode = CLOSE_POLICY_VIOLATION;

  constructor(readonly requestedName: string, options?: ErrorOptions) {
    super(`path escapes destination root: ${requestedName}`, options);
  }
}

/** Filesystem failure, or text where payload framing was expected. */
export class IOError extends TransferError {
  readonly kind = "io";
  readonly closeCode = CLOSE_INTERNAL_ERROR;
}

/** Compressed payload was truncated or corrupt. */
export class DecodeError extends TransferError {
  readonly kind = "decode";
  readonly closeCode = CLOSE_INTERNAL_ERROR;
}

/** Peer sent something other than the expected control token. */
export class ProtocolError extends TransferError {
  readonly kind = "protocol";
  readonly closeCode = CLOSE_PROTOCOL_ERROR;

  constructor(readonly received: string, message?: string, options?: ErrorOptions) {
    super(message ?? `unexpected message from peer: ${received}`, options);
  }
}

/** Channel closed or errored underneath the session. */
export class TransportError extends TransferError {
  readonly kind = "transport";
  readonly closeCode = CLOSE_ABNORMAL;

  constructor(
    message: string,
    readonly code?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalise anything thrown into a TransferError, keeping the original as `cause`. */
export function asTransferError(
  err: unknown,
  fallback: (message: string, options: ErrorOptions) => TransferError,
): TransferError {
  if (err instanceof TransferError) return err;
  return fallback(describe(err), { cause: err });
}
