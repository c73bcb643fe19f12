import { describe, expect, test, afterEach, vi } from "vitest";
import { createLogger, formatLog } from "../logger.js";

describe("formatLog", () => {
  test("tags the line with UTC time, padded level and module", () => {
    const line = formatLog("warn", "History", "Skipping record", new Date("2026-03-01T09:30:00.000Z"));

    expect(line).toBe("[09:30:00.000] [WARN ] [History] Skipping record");
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  test("passes a detail argument only when given", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = createLogger("Test");
    const cause = new Error("disk full");

    log.error("first");
    log.error("second", cause);

    expect(error.mock.calls[0]).toHaveLength(1);
    expect(error.mock.calls[1][1]).toBe(cause);
    expect(String(error.mock.calls[1][0])).toMatch(/\[ERROR\] \[Test\] second$/);
  });

  test("prints debug lines only when DEBUG is set", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const log = createLogger("Test");

    vi.stubEnv("DEBUG", "");
    log.debug("hidden");
    expect(info).not.toHaveBeenCalled();

    vi.stubEnv("DEBUG", "1");
    log.debug("shown");
    expect(info).toHaveBeenCalledTimes(1);
  });
});
