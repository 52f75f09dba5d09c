/**
 * Browser-side gzip via CompressionStream, adapted to the Transmitter's
 * AsyncIterable compressor contract. Also runs on Node ≥ 18, where
 * CompressionStream is a global.
 */

import type { Compressor } from "./transmitter.js";

/**
 * Iterate a ReadableStream without relying on its (newer) async iterator.
 * Stopping early cancels the stream, which propagates up any pipe chain.
 */
export async function* readableChunks<T>(stream: ReadableStream<T>): AsyncIterable<T> {
  const reader = stream.getReader();
  let settled = false;
  try {
    for (;;) {
      let result: ReadableStreamReadResult<T>;
      try {
        result = await reader.read();
      } catch (err) {
        settled = true;
        throw err;
      }
      if (result.done) {
        settled = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!settled) await reader.cancel();
    reader.releaseLock();
  }
}

/** Pull-based ReadableStream over an async iterable; cancel() returns the iterator. */
export function iterableStream(input: AsyncIterable<Uint8Array>): ReadableStream<BufferSource> {
  const iterator = input[Symbol.asyncIterator]();
  return new ReadableStream<BufferSource>({
    async pull(controller) {
      const { value, done } = await iterator.next();
      if (done) {
        controller.close();
        return;
      }
      // new Uint8Array(view) copies into a plain ArrayBuffer (not
      // SharedArrayBuffer), which the encoder's BufferSource input accepts.
      controller.enqueue(new Uint8Array(value));
    },
    async cancel(reason: unknown) {
      await iterator.return?.(reason);
    },
  });
}

export const gzipStream: Compressor = (input) =>
  readableChunks(iterableStream(input).pipeThrough(new CompressionStream("gzip")));
