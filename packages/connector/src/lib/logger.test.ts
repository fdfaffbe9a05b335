import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { setupLogger, setLogLevel, parseLogLevel, getLogLevel } from "./logger.js";

describe("logger", () => {
  beforeEach(() => {
    setLogLevel("info");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log info messages with timestamp, level and module name", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = setupLogger("strava-api");

    logger.info("fetched page 1");

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    const line = String(consoleSpy.mock.calls[0][0]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO  \[strava-api\] fetched page 1$/);
  });

  it("should route warn and error to stderr", () => {
    const outSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = setupLogger("test");

    logger.warn("slow down");
    logger.error("broken");

    expect(outSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledTimes(2);
    expect(String(errSpy.mock.calls[0][0])).toContain("WARN  [test] slow down");
  });

  it("should respect log level (warn)", () => {
    const outSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("warn");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(outSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledTimes(2);
  });

  it("should respect log level (debug)", () => {
    const outSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("debug");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(outSpy).toHaveBeenCalledTimes(2);
    expect(errSpy).toHaveBeenCalledTimes(2);
    expect(getLogLevel()).toBe("debug");
  });

  describe("parseLogLevel", () => {
    it("should accept known levels case-insensitively", () => {
      expect(parseLogLevel("WARN")).toBe("warn");
      expect(parseLogLevel(" debug ")).toBe("debug");
    });

    it("should return null for unknown or missing values", () => {
      expect(parseLogLevel("verbose")).toBeNull();
      expect(parseLogLevel(undefined)).toBeNull();
    });
  });
});
