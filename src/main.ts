/**
 * Browser entry point — wires the file picker and drag-and-drop onto a
 * transfer session. One WebSocket session per selection/drop.
 */

import { BandwidthMeter, formatRate } from "./bandwidth.js";
import { BrowserChannel, portalSocketUrl } from "./browser-channel.js";
import { gzipStream } from "./compression.js";
import { fromFile, walkEntry, type EntryLike } from "./file-entries.js";
import { fileKind, KIND_GLYPHS } from "./file-kind.js";
import { sendSession, type SessionView } from "./send-session.js";
import type { FileSource } from "./transmitter.js";
import type { FileHeader } from "../server/protocol.js";

function requireElement<T extends HTMLElement>(id: string, type: new () => T): T {
  const el = document.getElementById(id);
  if (!(el instanceof type)) throw new Error(`#${id} element not found`);
  return el;
}

const fileInput = requireElement("fileInput", HTMLInputElement);
const fileList = requireElement("fileList", HTMLUListElement);
const statusLine = requireElement("status", HTMLElement);
const bandwidth = requireElement("bandwidth", HTMLElement);

const meter = new BandwidthMeter((rate) => {
  bandwidth.textContent = formatRate(rate);
});

// -- Progress rendering --

const rows = new Map<string, { li: HTMLLIElement; label: HTMLSpanElement }>();

function row(header: FileHeader): HTMLSpanElement {
  let entry = rows.get(header.name);
  if (!entry) {
    const kind = fileKind(header);
    const li = document.createElement("li");
    li.className = `kind-${kind}`;
    const icon = document.createElement("span");
    icon.className = "icon";
    icon.textContent = KIND_GLYPHS[kind];
    const label = document.createElement("span");
    li.append(icon, label);
    fileList.appendChild(li);
    entry = { li, label };
    rows.set(header.name, entry);
  }
  return entry.label;
}

// Bandwidth samples are taken per file; a new name restarts the count
let sampled = { name: "", bytes: 0, time: 0 };

function showProgress(header: FileHeader, bytesRead: number): void {
  const pct = header.size > 0 ? Math.min(100, Math.round((bytesRead / header.size) * 100)) : 100;
  row(header).textContent = `${header.name} — ${pct} %`;

  const now = performance.now();
  if (sampled.name !== header.name) sampled = { name: header.name, bytes: 0, time: now };
  const delta = bytesRead - sampled.bytes;
  if (delta > 0) meter.addSample(now - sampled.time, delta);
  sampled = { name: header.name, bytes: bytesRead, time: now };
}

function showPersisted(header: FileHeader): void {
  rows.get(header.name)?.li.remove();
  rows.delete(header.name);
}

// -- Sending --

const view: SessionView = {
  begin: () => document.body.classList.add("sending"),
  finish: () => document.body.classList.remove("sending"),
  status: (text) => {
    statusLine.textContent = text;
  },
  progress: showProgress,
  persisted: showPersisted,
};

function sendAll(sources: AsyncIterable<FileSource> | Iterable<FileSource>): Promise<void> {
  return sendSession(sources, {
    connect: () => BrowserChannel.open(portalSocketUrl(window.location.href)),
    compress: gzipStream,
    view,
  });
}

async function* droppedSources(entries: EntryLike[]): AsyncIterable<FileSource> {
  for (const entry of entries) {
    for await (const dropped of walkEntry(entry)) {
      yield fromFile(dropped.file, dropped.name);
    }
  }
}

function report(err: unknown): void {
  console.error("portal transfer failed:", err);
}

fileInput.addEventListener("change", () => {
  const files = Array.from(fileInput.files ?? []);
  if (files.length === 0) return;
  sendAll(files.map((file) => fromFile(file)))
    .catch(report)
    .finally(() => {
      fileInput.value = "";
    });
});

// -- Drag and drop --

document.body.addEventListener("dragenter", () => document.body.classList.add("drag-over"), { passive: true });
document.body.addEventListener("dragleave", () => document.body.classList.remove("drag-over"), { passive: true });
document.body.addEventListener("dragover", (ev) => {
  ev.preventDefault();
  document.body.classList.add("drag-over");
});
document.body.addEventListener("drop", (ev) => {
  ev.preventDefault();
  ev.stopPropagation();
  document.body.classList.remove("drag-over");

  // Entries must be taken synchronously; the DataTransfer is cleared after this handler
  const entries: EntryLike[] = [];
  for (const item of Array.from(ev.dataTransfer?.items ?? [])) {
    const entry = item.webkitGetAsEntry();
    if (entry) entries.push(entry);
  }
  if (entries.length === 0) return;
  sendAll(droppedSources(entries)).catch(report);
});
