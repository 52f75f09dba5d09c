/**
 * Destination containment.
 *
 * Client-supplied names are joined onto a canonical root and must stay
 * strictly below it. Checked before any mkdir/open for that header.
 */

import { mkdir, realpath } from "node:fs/promises";
import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { PathViolation } from "./errors.js";

/**
 * Create `path` if missing and return its real absolute path. The result is
 * what the guard compares against, so symlinked roots resolve once here.
 */
export async function canonicalizeRoot(path: string): Promise<string> {
  const absolute = resolve(path);
  await mkdir(absolute, { recursive: true });
  return realpath(absolute);
}

/** True when `rel` (a path relative to some root) points at or above it. */
function escapesRoot(rel: string): boolean {
  return (
    rel === "" ||
    rel === ".." ||
    rel.startsWith(".." + sep) ||
    isAbsolute(rel)
  );
}

/**
 * Resolve `name` under `root`. Throws PathViolation for the root itself,
 * anything outside it (`..` traversal, however it's spelled) and names
 * containing NUL.
 */
export function resolveDestination(root: string, name: string): string {
  if (name.includes("\0")) throw new PathViolation(name);
  const target = join(root, name);
  if (escapesRoot(relative(root, target))) throw new PathViolation(name);
  return target;
}
