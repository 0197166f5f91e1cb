import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  getLogger,
  getLoggerCountsBreakdown,
  isLogLevel,
  Logger,
  resetAllLoggerCounts,
} from "../src/logger.ts";

describe("logger", () => {
  beforeEach(() => {
    resetAllLoggerCounts();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  const PREFIX = /^\[(DEBUG|INFO|WARN|ERROR)\]\[(.+::)?\d{2}:\d{2}:\d{2}\.\d{3}\]$/;

  describe("output", () => {
    it("prefixes messages with level and timestamp", () => {
      const spy = vi.spyOn(console, "log").mockImplementation(() => {});
      const logger = new Logger(undefined, { level: "info" });
      logger.info("hello", "world");

      expect(spy).toHaveBeenCalledTimes(1);
      const [prefix, ...rest] = spy.mock.calls[0];
      expect(prefix).toMatch(PREFIX);
      expect(String(prefix).startsWith("[INFO][")).toBe(true);
      expect(rest).toEqual(["hello", "world"]);
    });

    it("tags messages with the module name", () => {
      const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
      const logger = new Logger("tagged", { level: "info" });
      logger.warn("careful");

      const [prefix] = spy.mock.calls[0];
      expect(String(prefix).startsWith("[WARN][tagged::")).toBe(true);
    });

    it("routes each level to its console method", () => {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const info = vi.spyOn(console, "log").mockImplementation(() => {});
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = new Logger("levels", { level: "debug" });

      logger.debug("d");
      logger.log("l");
      logger.info("i");
      logger.warn("w");
      logger.error("e");

      expect(debug).toHaveBeenCalledTimes(1);
      expect(info).toHaveBeenCalledTimes(2);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledTimes(1);
    });

    it("evaluates lazy messages and flattens arrays", () => {
      const spy = vi.spyOn(console, "log").mockImplementation(() => {});
      const logger = new Logger(undefined, { level: "info" });
      logger.info("static", () => ["lazy", 1], () => "tail");

      expect(spy.mock.calls[0].slice(1)).toEqual(["static", "lazy", 1, "tail"]);
    });
  });

  describe("filtering", () => {
    it("drops messages below the logger level without evaluating them", () => {
      const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
      const logger = new Logger("quiet", { level: "info" });
      let evaluated = false;
      logger.debug(() => {
        evaluated = true;
        return "expensive";
      });

      expect(spy).not.toHaveBeenCalled();
      expect(evaluated).toBe(false);
    });

    it("writes nothing while disabled", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = new Logger("off", { enabled: false, level: "info" });
      logger.error("boom");
      expect(spy).not.toHaveBeenCalled();

      logger.disabled = false;
      logger.error("boom");
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe("counts", () => {
    it("counts calls even when they are filtered out", () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      const logger = new Logger("counted", { enabled: false });
      logger.debug("a");
      logger.info("b");
      logger.info("c");
      logger.warn("d");

      expect(logger.counts).toEqual({
        debug: 1,
        info: 2,
        warn: 1,
        error: 0,
        total: 4,
      });

      logger.resetCounts();
      expect(logger.counts.total).toBe(0);
    });

    it("reports a breakdown across registered loggers", () => {
      const first = getLogger("breakdown-first", { enabled: false });
      const second = getLogger("breakdown-second", { enabled: false });
      first.info("x");
      second.warn("y");
      second.error("z");

      const breakdown = getLoggerCountsBreakdown();
      expect(breakdown["breakdown-first"]).toBe(1);
      expect(breakdown["breakdown-second"]).toBe(2);
      expect(breakdown.total).toBeGreaterThanOrEqual(3);
    });
  });

  describe("getLogger", () => {
    it("returns the same instance for the same module name", () => {
      const a = getLogger("shared-module", { level: "warn" });
      const b = getLogger("shared-module", { level: "debug" });
      expect(a).toBe(b);
      expect(b.level).toBe("warn");
    });
  });

  describe("environment", () => {
    it("takes the default level from LOG_LEVEL", () => {
      vi.stubEnv("LOG_LEVEL", "warn");
      expect(new Logger("env-level").level).toBe("warn");
    });

    it("ignores unknown LOG_LEVEL values", () => {
      vi.stubEnv("LOG_LEVEL", "verbose");
      expect(new Logger("env-level").level).toBe("info");
    });

    it("prefers an explicit level", () => {
      vi.stubEnv("LOG_LEVEL", "warn");
      expect(new Logger("env-level", { level: "debug" }).level).toBe("debug");
    });
  });

  describe("isLogLevel", () => {
    it("accepts known levels only", () => {
      expect(isLogLevel("debug")).toBe(true);
      expect(isLogLevel("error")).toBe(true);
      expect(isLogLevel("trace")).toBe(false);
      expect(isLogLevel("toString")).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });
});
