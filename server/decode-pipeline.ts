/**
 * Receive-side decode pipeline for one file.
 *
 *   read loop ──write()──▶ PassThrough (bounded) ──▶ gunzip ──▶ file
 *
 * The read loop and the decode/write side progress independently; the
 * hand-off holds at most `highWaterMark` compressed bytes before write()
 * suspends until it drains. finish() is the half-close: it ends the input
 * and resolves once the file stream has flushed and closed.
 */

import { PassThrough, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
import { DecodeError, IOError, TransferError } from "./errors.js";

export const DEFAULT_PIPE_HIGH_WATER_MARK = 1024 * 1024; // 1 MiB

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/** zlib failures carry Z_* codes; everything else came from the file side. */
export function classifyPipelineError(err: unknown): TransferError {
  if (err instanceof TransferError) return err;
  const message = err instanceof Error ? err.message : String(err);
  if (errorCode(err)?.startsWith("Z_")) {
    return new DecodeError(`failed to decode payload: ${message}`, { cause: err });
  }
  return new IOError(`failed to write file: ${message}`, { cause: err });
}

export class DecodePipeline {
  private readonly input: PassThrough;
  /** Settles with null on clean drain, or the failure. Never rejects. */
  private readonly settled: Promise<TransferError | null>;
  private compressedBytes = 0;
  private finished = false;

  constructor(destination: Writable, highWaterMark = DEFAULT_PIPE_HIGH_WATER_MARK) {
    this.input = new PassThrough({ highWaterMark });
    const gunzip = createGunzip();
    this.settled = pipeline(this.input, gunzip, destination).then(
      () => null,
      (err: unknown) => classifyPipelineError(err),
    );
  }

  /** Compressed bytes accepted so far. */
  get received(): number {
    return this.compressedBytes;
  }

  /** Hand one compressed frame to the decoder, waiting while the hand-off is full. */
  async write(chunk: Uint8Array): Promise<void> {
    if (this.finished) throw new IOError("payload received after end of file");
    if (this.input.destroyed) await this.rethrow();
    this.compressedBytes += chunk.byteLength;
    if (this.input.write(chunk)) return;
    await this.waitForDrain();
    if (this.input.destroyed) await this.rethrow();
  }

  /** Close the input side and wait for the decoder and file to drain. */
  async finish(): Promise<void> {
    this.finished = true;
    this.input.end();
    const failure = await this.settled;
    if (failure) throw failure;
  }

  /** Tear down without draining (session ending mid-file). Closes the file. */
  async abort(reason: TransferError): Promise<void> {
    this.finished = true;
    this.input.destroy(reason);
    await this.settled;
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        this.input.off("drain", done);
        this.input.off("close", done);
        resolve();
      };
      this.input.on("drain", done);
      // Pipeline failure destroys the input; close fires instead of drain
      this.input.on("close", done);
    });
  }

  private async rethrow(): Promise<never> {
    const failure = await this.settled;
    throw failure ?? new IOError("decode pipeline closed");
  }
}
