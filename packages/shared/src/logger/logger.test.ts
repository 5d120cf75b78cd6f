import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "./index.js";

describe("Logger", () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  const originalEnv = process.env;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FORMAT;
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    process.env = originalEnv;
  });

  function lastJson(): Record<string, unknown> {
    const calls = consoleErrorSpy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  }

  describe("level filtering", () => {
    it("drops debug entries at the default info level", () => {
      const logger = createLogger("test");
      logger.debug("hidden");
      logger.info("shown");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleErrorSpy.mock.calls[0][0])).toContain("[INFO] [test] shown");
    });

    it("reads LOG_LEVEL from the environment", () => {
      process.env.LOG_LEVEL = "DEBUG";
      const logger = createLogger("test");
      logger.debug("visible");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it("silent turns every level off", () => {
      const logger = createLogger("test", { level: "silent" });
      logger.error("nothing");

      expect(consoleErrorSpy).not.toHaveBeenCalled();
      expect(logger.isLevelEnabled("error")).toBe(false);
    });

    it("explicit level wins over LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "debug";
      const logger = createLogger("test", { level: "warn" });

      expect(logger.isLevelEnabled("info")).toBe(false);
      expect(logger.isLevelEnabled("warn")).toBe(true);
    });
  });

  describe("text format", () => {
    it("appends data as JSON", () => {
      const logger = createLogger("Matcher");
      logger.info("switched", { to: "serve" });

      expect(String(consoleErrorSpy.mock.calls[0][0])).toMatch(
        /^\[.+\] \[INFO\] \[Matcher\] switched \{"to":"serve"\}$/,
      );
    });

    it("shows the invocation id when set", () => {
      const logger = createLogger("Engine", { context: { invocationId: "inv-1" } });
      logger.warn("careful");

      expect(String(consoleErrorSpy.mock.calls[0][0])).toContain("[WARN] [Engine] [inv-1] careful");
    });
  });

  describe("json format", () => {
    it("renders context keys in snake_case", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test");
      logger.setContext({ invocationId: "inv-123", command: "app serve" });
      logger.info("dispatching");

      const parsed = lastJson();
      expect(parsed.invocation_id).toBe("inv-123");
      expect(parsed.command).toBe("app serve");
      expect(parsed.module).toBe("test");
      expect(parsed.level).toBe("info");
      expect(parsed.message).toBe("dispatching");
    });

    it("merges data fields into the entry", () => {
      const logger = createLogger("test", { format: "json" });
      logger.error("failed", { exitCode: 2 });

      expect(lastJson().exitCode).toBe(2);
    });
  });

  describe("child()", () => {
    it("inherits context and prefixes the module name", () => {
      const logger = createLogger("parent", { format: "json" });
      logger.setContext({ invocationId: "inv-789" });
      const child = logger.child("child");
      child.info("child message");

      const parsed = lastJson();
      expect(parsed.invocation_id).toBe("inv-789");
      expect(parsed.module).toBe("parent:child");
    });

    it("does not leak child context into the parent", () => {
      const logger = createLogger("parent", { format: "json" });
      const child = logger.child("child");
      child.setContext({ command: "only-child" });
      logger.info("parent message");

      expect(lastJson().command).toBeUndefined();
    });
  });

  describe("time()", () => {
    it("returns a numeric duration >= 0 and logs at debug level", () => {
      const logger = createLogger("test", { level: "debug", format: "json" });
      const stop = logger.time("parse");
      const duration = stop();

      expect(duration).toBeGreaterThanOrEqual(0);
      const parsed = lastJson();
      expect(parsed.level).toBe("debug");
      expect(parsed.message).toBe("parse completed");
      expect(parsed.label).toBe("parse");
      expect(parsed.durationMs).toBe(duration);
    });
  });
});
