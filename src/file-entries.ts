/**
 * Turning browser File objects and dropped directory trees into
 * Transmitter FileSources.
 *
 * The entry interfaces are the subset of the File System Entry API we use,
 * so DOM entries satisfy them and tests can hand in plain objects.
 */

import { readableChunks } from "./compression.js";
import type { FileSource } from "./transmitter.js";

export interface EntryLike {
  readonly name: string;
  readonly fullPath: string;
  readonly isFile: boolean;
  readonly isDirectory: boolean;
}

export interface FileEntryLike extends EntryLike {
  file(success: (file: File) => void, error?: (err: unknown) => void): void;
}

export interface DirectoryReaderLike {
  readEntries(success: (entries: EntryLike[]) => void, error?: (err: unknown) => void): void;
}

export interface DirectoryEntryLike extends EntryLike {
  createReader(): DirectoryReaderLike;
}

export interface DroppedFile {
  file: File;
  /** Path relative to the drop, forward slashes, no leading slash. */
  name: string;
}

function isFileEntry(entry: EntryLike): entry is FileEntryLike {
  return entry.isFile && "file" in entry;
}

function isDirectoryEntry(entry: EntryLike): entry is DirectoryEntryLike {
  return entry.isDirectory && "createReader" in entry;
}

export function relativeName(fullPath: string): string {
  return fullPath.replace(/^\/+/, "");
}

function readFile(entry: FileEntryLike): Promise<File> {
  return new Promise((resolve, reject) => entry.file(resolve, reject));
}

function readBatch(reader: DirectoryReaderLike): Promise<EntryLike[]> {
  return new Promise((resolve, reject) => reader.readEntries(resolve, reject));
}

/** readEntries returns at most ~100 entries per call; keep going until empty. */
async function readAll(entry: DirectoryEntryLike): Promise<EntryLike[]> {
  const reader = entry.createReader();
  const all: EntryLike[] = [];
  for (;;) {
    const batch = await readBatch(reader);
    if (batch.length === 0) return all;
    all.push(...batch);
  }
}

/** Depth-first walk of a dropped entry, yielding files in directory order. */
export async function* walkEntry(entry: EntryLike): AsyncGenerator<DroppedFile> {
  if (isFileEntry(entry)) {
    yield { file: await readFile(entry), name: relativeName(entry.fullPath) };
    return;
  }
  if (isDirectoryEntry(entry)) {
    for (const child of await readAll(entry)) {
      yield* walkEntry(child);
    }
  }
}

export function fromFile(file: File, name: string = file.webkitRelativePath || file.name): FileSource {
  return {
    name,
    size: file.size,
    lastModified: file.lastModified,
    mime: file.type,
    stream: () => readableChunks(file.stream()),
  };
}
