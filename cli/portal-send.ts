#!/usr/bin/env npx tsx
/**
 * portal-send — push files or folders to a running portal from a terminal.
 *
 * Same protocol as the browser page, different front end.
 *
 * Usage:
 *   npx tsx cli/portal-send.ts <ws-url> <path...>
 *   npx tsx cli/portal-send.ts ws://laptop:8080/ws ./photos notes.txt
 */

import { TransferError } from "../server/errors.js";
import { sendPaths } from "./send-client.js";

// --- ANSI helpers ---

const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";
const GREEN = "\x1b[32m";
const RED = "\x1b[31m";

function humanBytes(n: number): string {
  if (n < 1024) return `${n} B`;
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KiB`;
  return `${(n / (1024 * 1024)).toFixed(1)} MiB`;
}

function usage(): never {
  process.stderr.write(`usage: portal-send <ws-url> <path...>\n`);
  process.exit(2);
}

async function main(): Promise<void> {
  const [url, ...paths] = process.argv.slice(2);
  if (!url || paths.length === 0) usage();

  const started = Date.now();
  const summary = await sendPaths(url, paths, {
    callbacks: {
      onProgress: (header, bytesRead) => {
        const pct = header.size > 0 ? Math.min(100, Math.round((bytesRead / header.size) * 100)) : 100;
        process.stdout.write(`\r${DIM}${header.name}${RESET} ${pct}%`);
      },
      onSent: (header) => {
        process.stdout.write(`\r${header.name} ${DIM}${humanBytes(header.size)}${RESET}\n`);
      },
      onPersisted: (header) => {
        process.stdout.write(`${GREEN}✓${RESET} ${header.name}\n`);
      },
    },
  });

  const secs = ((Date.now() - started) / 1000).toFixed(1);
  process.stdout.write(`${BOLD}${summary.files} file(s), ${humanBytes(summary.bytes)} in ${secs}s${RESET}\n`);
}

main().catch((err: unknown) => {
  const label = err instanceof TransferError ? err.kind : "error";
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`\n${RED}${label}:${RESET} ${message}\n`);
  process.exit(1);
});
