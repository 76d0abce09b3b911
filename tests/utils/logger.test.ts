import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  createLogger,
  getLogLevel,
  isLogLevel,
  logger,
  setLogLevel,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  test("sets and gets the level", () => {
    setLogLevel("debug");
    expect(getLogLevel()).toBe("debug");
  });

  test("isLogLevel recognizes the four levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  describe("level filtering", () => {
    test("debug is dropped at info", () => {
      setLogLevel("info");
      logger.debug("hidden");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("debug is written at debug", () => {
      setLogLevel("debug");
      logger.debug("shown");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("info is dropped at warn", () => {
      setLogLevel("warn");
      logger.info("hidden");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("warn goes to console.warn and error to console.error", () => {
      setLogLevel("warn");
      logger.warn("careful");
      logger.error("broken");
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("error still logs at error", () => {
      setLogLevel("error");
      logger.warn("hidden");
      logger.error("shown");
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("scoped loggers share the global level", () => {
      setLogLevel("error");
      createLogger("backup").info("hidden");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe("formatting", () => {
    test("includes the padded level and the message", () => {
      setLogLevel("info");
      logger.info("snapshot created");

      const line = String(consoleLogSpy.mock.calls[0]?.[0]);
      expect(line).toContain("INFO \x1b[0m snapshot created");
      expect(line).toMatch(/\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\]/);
    });

    test("puts the scope in brackets before the message", () => {
      setLogLevel("info");
      createLogger("covers").warn("remote unavailable");

      const line = String(consoleWarnSpy.mock.calls[0]?.[0]);
      expect(line).toContain("WARN \x1b[0m [covers] remote unavailable");
    });

    test("appends objects as JSON", () => {
      setLogLevel("info");
      logger.info("counts", { daily: 7 });

      const line = String(consoleLogSpy.mock.calls[0]?.[0]);
      expect(line.endsWith(` ${JSON.stringify({ daily: 7 }, null, 2)}`)).toBe(true);
    });

    test("appends only the message of an error outside debug", () => {
      setLogLevel("info");
      logger.error("failed", new Error("disk full"));

      const line = String(consoleErrorSpy.mock.calls[0]?.[0]);
      expect(line.endsWith(" failed disk full")).toBe(true);
    });
  });
});
