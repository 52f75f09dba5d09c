/**
 * Server configuration from argv + environment.
 *
 *   portal [--port N] [--path DIR] [--debug]
 *
 * Env fallbacks: PORTAL_PORT, PORTAL_ROOT. The root is created when missing
 * and canonicalized once here; sessions only ever see the frozen result.
 */

import { parseArgs } from "node:util";
import { canonicalizeRoot } from "./path-guard.js";

export interface PortalConfig {
  /** 0 = any free port. */
  readonly port: number;
  /** Canonical absolute destination root. */
  readonly root: string;
  readonly debug: boolean;
}

export interface RawConfig {
  port: number;
  path: string;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(port) || port > 65535) {
    throw new ConfigError(`invalid port: ${value}`);
  }
  return port;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        port: { type: "string", short: "p" },
        path: { type: "string" },
        debug: { type: "boolean", default: false },
      },
      strict: true,
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/** Pure argv/env parsing — no filesystem access. */
export function parseConfig(argv: string[], env: NodeJS.ProcessEnv): RawConfig {
  const values = readArgs(argv);
  return {
    port: parsePort(values.port ?? env.PORTAL_PORT ?? "0"),
    path: values.path ?? env.PORTAL_ROOT ?? ".",
    debug: values.debug ?? false,
  };
}

export async function loadConfig(argv: string[], env: NodeJS.ProcessEnv): Promise<PortalConfig> {
  const raw = parseConfig(argv, env);
  let root: string;
  try {
    root = await canonicalizeRoot(raw.path);
  } catch (err) {
    throw new ConfigError(`failed to prepare destination ${raw.path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return Object.freeze({ port: raw.port, root, debug: raw.debug });
}
