import { describe, it, expect, vi, afterEach } from "vitest";

import { LogLevel, Logger, parseLogLevel } from "../../src/sdk/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("prefixes messages with tag and level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    new Logger("didwire", LogLevel.WARN).child("agent").warn("dropped");
    expect(warn).toHaveBeenCalledWith("[didwire:agent] WARN dropped");
  });

  it("suppresses messages below its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    new Logger("didwire", LogLevel.WARN).info("hidden");
    expect(info).not.toHaveBeenCalled();
  });

  it("writes JSON lines when asked", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new Logger("didwire", LogLevel.DEBUG);
    log.setJson(true);
    log.error("failed", new Error("boom"));

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({
      tag: "didwire",
      level: "ERROR",
      message: "failed",
      data: [{ name: "Error", message: "boom" }],
    });
  });
});

describe("parseLogLevel", () => {
  it("maps names case-insensitively", () => {
    expect(parseLogLevel("Debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" none ")).toBe(LogLevel.NONE);
    expect(parseLogLevel("loud")).toBeNull();
  });
});
