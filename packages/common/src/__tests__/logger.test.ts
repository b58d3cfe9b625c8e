import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, LogLevel, parseLogLevel } from "../utils/logger.js";

const fixedNow = () => new Date("2026-01-01T00:00:00.000Z");

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("writes one JSON line with service and meta", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("test:svc", { level: LogLevel.DEBUG, now: fixedNow });

    logger.info("hello", { count: 2 });

    expect(out).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(out.mock.calls[0]?.[0]))).toEqual({
      timestamp: "2026-01-01T00:00:00.000Z",
      level: "INFO",
      service: "test:svc",
      message: "hello",
      count: 2,
    });
  });

  it("routes WARN and ERROR to their console streams", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("test", { level: LogLevel.DEBUG, now: fixedNow });

    logger.warn("careful");
    logger.error("broken");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(error.mock.calls[0]?.[0])).level).toBe("ERROR");
  });

  it("drops entries below the level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("test", { level: LogLevel.WARN });

    logger.debug("noise");
    logger.info("noise");

    expect(out).not.toHaveBeenCalled();
  });
});

describe("parseLogLevel", () => {
  it("parses names case-insensitively", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" Warn ")).toBe(LogLevel.WARN);
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
