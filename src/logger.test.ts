import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel, setLogLevel } from "./logger";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("silent");
    vi.restoreAllMocks();
  });

  it("writes at or above the configured level", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("info");

    const log = createLogger("test");
    log.debug("hidden");
    log.info("shown", { query: "solar" });
    log.error("failed");

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toContain("[test]");
    expect(info.mock.calls[0][0]).toContain("shown");
    expect(info.mock.calls[0][0]).toContain('{"query":"solar"}');
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("is quiet when silent", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("silent");

    createLogger("test").warn("nothing");

    expect(warn).not.toHaveBeenCalled();
  });

  it("recognises level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
