/**
 * Process-level failure handlers installed by main.ts.
 */

import { emit, errorDetail } from "./event-bus.js";

type Exit = (code: number) => void;

/** Log, then crash: state after an uncaught exception is unknown. */
export function crashOnUncaught(err: unknown, exit: Exit = (code) => process.exit(code)): void {
  emit({ type: "server:uncaught-exception", error: errorDetail(err) });
  exit(1);
}

export function logUnhandledRejection(reason: unknown): void {
  emit({ type: "server:unhandled-rejection", error: errorDetail(reason) });
}
