import { describe, it, expect, vi } from "vitest";
import { subscribe } from "./event-bus.js";
import type { PortalEvent } from "./events.js";
import { crashOnUncaught, logUnhandledRejection } from "./process-handlers.js";

describe("process handlers", () => {
  it("logs an uncaught exception and exits with status 1", () => {
    const events: PortalEvent[] = [];
    const unsubscribe = subscribe((e) => events.push(e));
    const exit = vi.fn();

    crashOnUncaught(new Error("boom"), exit);
    unsubscribe();

    expect(exit).toHaveBeenCalledWith(1);
    expect(events).toHaveLength(1);
    expect(events[0].type).toBe("server:uncaught-exception");
  });

  it("only logs an unhandled rejection", () => {
    const events: PortalEvent[] = [];
    const unsubscribe = subscribe((e) => events.push(e));

    logUnhandledRejection("nope");
    unsubscribe();

    expect(events).toEqual([{ type: "server:unhandled-rejection", error: "nope" }]);
  });
});
