import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger } from "./logs.js";

describe("Logger", () => {
  let original: string | undefined;

  beforeEach(() => {
    original = process.env.ARGSPEC_DEBUG;
    delete process.env.ARGSPEC_DEBUG;
  });

  afterEach(() => {
    if (original !== undefined) {
      process.env.ARGSPEC_DEBUG = original;
    } else {
      delete process.env.ARGSPEC_DEBUG;
    }
    vi.restoreAllMocks();
  });

  it("should format an entry on one line", () => {
    const logger = new Logger();

    expect(
      logger.format({
        timestamp: "2024-01-01T00:00:00.000Z",
        level: "debug",
        event: "parse.error",
        command: "app build",
        message: "boom",
        details: { code: "MISSING_REQUIRED" },
      })
    ).toBe('[2024-01-01T00:00:00.000Z] [DEBUG] [parse.error] app build boom {"code":"MISSING_REQUIRED"}');
  });

  it("should print debug entries only when ARGSPEC_DEBUG is set", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger();

    logger.debug("parse.start");
    expect(spy).not.toHaveBeenCalled();

    process.env.ARGSPEC_DEBUG = "1";
    logger.debug("parse.start", { command: "app" });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(/^\[.+\] \[DEBUG\] \[parse\.start\] app$/);
  });

  it("should print errors regardless of ARGSPEC_DEBUG", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    new Logger().error("cli.failed");

    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("should stay silent when disabled", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger();
    process.env.ARGSPEC_DEBUG = "1";

    logger.setEnabled(false);
    logger.debug("parse.start");
    logger.error("cli.failed");

    expect(spy).not.toHaveBeenCalled();
  });
});
