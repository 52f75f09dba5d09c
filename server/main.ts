#!/usr/bin/env npx tsx
/**
 * portal — receive files dropped into the browser page onto this machine.
 *
 * Usage:
 *   npx tsx server/main.ts [--port N] [--path DIR] [--debug]
 */

import { reachableUrls } from "./addresses.js";
import { ConfigError, loadConfig } from "./config.js";
import { emit, errorDetail } from "./event-bus.js";
import { initLogger } from "./logger.js";
import { crashOnUncaught, logUnhandledRejection } from "./process-handlers.js";
import { createPortalServer } from "./portal-server.js";
import { initStatusBuffer } from "./status-buffer.js";

// Grace period for in-flight sessions before the process exits anyway
const SHUTDOWN_GRACE_MS = 5_000;

async function main(): Promise<void> {
  const config = await loadConfig(process.argv.slice(2), process.env);

  initLogger(config.debug ? { level: "debug" } : {});
  initStatusBuffer();

  const portal = createPortalServer({ root: config.root });
  const address = await portal.listen(config.port);
  const urls = reachableUrls(address.port);
  emit({ type: "server:start", port: address.port, root: config.root, urls });
  process.stdout.write(urls.join("\n") + "\n");

  // -- Graceful shutdown --

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    emit({ type: "server:shutdown", signal });
    setTimeout(() => process.exit(0), SHUTDOWN_GRACE_MS).unref();
    portal.close().then(
      () => {
        emit({ type: "server:shutdown-complete" });
        process.exit(0);
      },
      (err: unknown) => {
        emit({ type: "server:uncaught-exception", error: errorDetail(err) });
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

process.on("uncaughtException", (err) => crashOnUncaught(err));
process.on("unhandledRejection", (reason) => logUnhandledRejection(reason));

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    process.stderr.write(`portal: ${err.message}\n`);
  } else {
    process.stderr.write(`portal: ${errorDetail(err)}\n`);
  }
  process.exit(1);
});
