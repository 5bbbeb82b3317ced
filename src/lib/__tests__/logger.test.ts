import { afterEach, describe, it, expect, vi } from "vitest";
import { logger, setLogLevel } from "../logger";

afterEach(() => {
  setLogLevel(undefined);
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("logger", () => {
  it("writes readable lines outside production", () => {
    vi.stubEnv("NODE_ENV", "development");
    const out = vi.spyOn(console, "log").mockImplementation(() => {});

    logger("test").info("hello", { count: 2 });

    expect(out).toHaveBeenCalledWith('INFO  [test] hello {"count":2}');
  });

  it("writes JSON lines in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    const out = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger("test").warn("careful");

    expect(out).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(out.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      module: "test",
      msg: "careful",
    });
  });

  it("drops lines below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const log = logger("test");
    log.info("hidden");
    log.error("shown");

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("falls back to info for an unknown LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "toString");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "log").mockImplementation(() => {});

    const log = logger("test");
    log.debug("hidden");
    log.info("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
  });

  it("prefers the configured level over LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    setLogLevel("error");
    const log = logger("test");
    log.warn("hidden");
    log.error("shown");

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("ignores LOG_LEVEL when forced", () => {
    vi.stubEnv("NODE_ENV", "development");
    vi.stubEnv("LOG_LEVEL", "error");
    const out = vi.spyOn(console, "log").mockImplementation(() => {});

    logger("trace", { force: true }).info("shown");

    expect(out).toHaveBeenCalledWith("INFO  [trace] shown");
  });

  it("times an operation", () => {
    vi.stubEnv("NODE_ENV", "production");
    const out = vi.spyOn(console, "log").mockImplementation(() => {});

    const done = logger("test").time("work");
    done({ items: 3 });

    const entry = JSON.parse(String(out.mock.calls[0][0]));
    expect(entry.msg).toBe("work completed");
    expect(entry.items).toBe(3);
    expect(typeof entry.durationMs).toBe("number");
  });
});
