import { describe, it, expect, vi, afterEach } from "vitest";
import { _formatLine, _handleEvent, initLogger, LEVEL_ORDER } from "./logger.js";
import { emit } from "./event-bus.js";
import type { PortalEvent } from "./events.js";

describe("logger", () => {
  describe("formatLine", () => {
    it("produces valid JSON with ts, level, type, and payload fields", () => {
      const event: PortalEvent = {
        type: "file:complete",
        path: "/srv/in/docs/a.txt",
        bytes: 11,
        durationMs: 4,
      };
      const parsed = JSON.parse(_formatLine(event, "info"));

      expect(parsed.ts).toMatch(/^\d{4}-\d{2}-\d{2}T/);
      expect(parsed.level).toBe("info");
      expect(parsed.type).toBe("file:complete");
      expect(parsed.path).toBe("/srv/in/docs/a.txt");
      expect(parsed.bytes).toBe(11);
      expect(parsed.durationMs).toBe(4);
    });

    it("spreads all payload fields into the JSON line", () => {
      const event: PortalEvent = { type: "session:end", reason: "eot", files: 3, bytes: 4096 };
      const parsed = JSON.parse(_formatLine(event, "info"));
      expect(parsed.reason).toBe("eot");
      expect(parsed.files).toBe(3);
      expect(parsed.bytes).toBe(4096);
    });
  });

  describe("LEVEL_ORDER", () => {
    it("orders debug < info < warn < error", () => {
      expect(LEVEL_ORDER.debug).toBeLessThan(LEVEL_ORDER.info);
      expect(LEVEL_ORDER.info).toBeLessThan(LEVEL_ORDER.warn);
      expect(LEVEL_ORDER.warn).toBeLessThan(LEVEL_ORDER.error);
    });
  });

  describe("level filtering", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("drops events below the configured level", () => {
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      initLogger({ level: "warn", file: null });

      _handleEvent({ type: "file:open", path: "/tmp/x" });
      _handleEvent({ type: "file:partial", path: "/tmp/x", received: 10 });

      expect(write).toHaveBeenCalledTimes(1);
      const parsed = JSON.parse(String(write.mock.calls[0][0]));
      expect(parsed.type).toBe("file:partial");
      expect(parsed.level).toBe("warn");
    });

    it("debug level lets everything through the bus subscription", () => {
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      initLogger({ level: "debug", file: null });

      emit({ type: "channel:pause", queued: 64 });

      const lines = write.mock.calls.map((call) => JSON.parse(String(call[0])));
      expect(lines.some((l) => l.type === "channel:pause" && l.queued === 64)).toBe(true);
    });
  });
});
