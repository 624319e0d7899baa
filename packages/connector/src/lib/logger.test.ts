import { describe, it, expect, vi, beforeEach } from "vitest";
import { setupLogger, setLogLevel, getLogLevel, isLogLevel, formatFields } from "./logger.js";

describe("logger", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    setLogLevel("info");
  });

  it("should create a logger with all methods", () => {
    const logger = setupLogger("test");

    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
  });

  it("should log messages with correct format", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = setupLogger("test-module");

    logger.info("test message");

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    const logOutput = String(consoleSpy.mock.calls[0][0]);
    expect(logOutput).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO  \[test-module\] test message$/);
  });

  it("should append fields as key=value pairs", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = setupLogger("sync");

    logger.info("progress", { activities: 25, streams: 180, skipped: 3 });

    const logOutput = String(consoleSpy.mock.calls[0][0]);
    expect(logOutput.endsWith("[sync] progress activities=25 streams=180 skipped=3")).toBe(true);
  });

  it("should respect log level (warn)", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("warn");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(consoleSpy).toHaveBeenCalledTimes(2);
    expect(getLogLevel()).toBe("warn");
  });

  it("should respect log level (debug)", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("debug");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(consoleSpy).toHaveBeenCalledTimes(4);
  });

  describe("formatFields", () => {
    it("should skip undefined values and keep null", () => {
      expect(formatFields({ a: 1, b: undefined, c: null })).toBe(" a=1 c=null");
    });

    it("should return empty string without fields", () => {
      expect(formatFields()).toBe("");
      expect(formatFields({})).toBe("");
    });
  });

  it("should recognise valid log levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
