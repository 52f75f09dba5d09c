/**
 * One page-initiated transfer: connect, send every source, wait for the
 * server to confirm them all, end the session. The DOM side only supplies
 * a SessionView.
 */

import type { FileHeader } from "../server/protocol.js";
import { Transmitter, type Compressor, type FileSource, type SenderChannel } from "./transmitter.js";

export interface SessionView {
  /** Transfer starting; lock the picker. */
  begin(): void;
  /** Always called last, whatever the outcome. */
  finish(): void;
  status(text: string): void;
  progress(header: FileHeader, bytesRead: number): void;
  persisted(header: FileHeader): void;
}

export interface SessionDeps {
  connect(): Promise<SenderChannel>;
  compress: Compressor;
  view: SessionView;
}

export async function sendSession(
  sources: AsyncIterable<FileSource> | Iterable<FileSource>,
  { connect, compress, view }: SessionDeps,
): Promise<void> {
  view.begin();
  view.status("");
  let channel: SenderChannel | null = null;
  try {
    channel = await connect();
    const transmitter = new Transmitter(channel, {
      compress,
      onProgress: (header, bytesRead) => view.progress(header, bytesRead),
      onPersisted: (header) => view.persisted(header),
    });
    for await (const source of sources) {
      await transmitter.transmit(source);
    }
    await transmitter.flush();
    transmitter.end();
    view.status("All files transferred.");
  } catch (err) {
    view.status(`Transfer failed: ${err instanceof Error ? err.message : String(err)}`);
    channel?.close();
    throw err;
  } finally {
    view.finish();
  }
}
