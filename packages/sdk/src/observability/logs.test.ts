import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, formatEntry, isLogLevel } from "./logs.js";

describe("formatEntry()", () => {
  it("should render event, location, message and details", () => {
    expect(
      formatEntry({
        timestamp: "2024-01-01T00:00:00.000Z",
        level: "warn",
        event: "repo.no_key",
        table: "User",
        message: "entity has no primary key",
        details: { operation: "save" },
      })
    ).toBe(
      '[2024-01-01T00:00:00.000Z] [WARN] [repo.no_key] User/ entity has no primary key {"operation":"save"}'
    );
  });

  it("should omit absent parts", () => {
    expect(
      formatEntry({ timestamp: "2024-01-01T00:00:00.000Z", level: "info", event: "repo.save" })
    ).toBe("[2024-01-01T00:00:00.000Z] [INFO] [repo.save]");
  });

  it("should print the blob after the table", () => {
    expect(
      formatEntry({
        timestamp: "t",
        level: "error",
        event: "blob.write.failed",
        blob: "User_id_1",
      })
    ).toBe("[t] [ERROR] [blob.write.failed] /User_id_1");
  });
});

describe("isLogLevel()", () => {
  it("should accept known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should route levels to console methods", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.info("a");
    logger.warn("b");
    logger.error("c");

    expect(log).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should drop entries below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.info("quiet");
    logger.warn("loud");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(logger.level).toBe("warn");
  });

  it("should stay silent when disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger();

    logger.setEnabled(false);
    logger.error("hidden");

    expect(error).not.toHaveBeenCalled();
  });

  it("should require BLOBREPO_DEBUG for debug output", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const saved = process.env.BLOBREPO_DEBUG;
    const logger = new Logger("debug");

    try {
      delete process.env.BLOBREPO_DEBUG;
      logger.debug("hidden");
      expect(debug).not.toHaveBeenCalled();

      process.env.BLOBREPO_DEBUG = "1";
      logger.debug("shown", { table: "User" });
      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug.mock.calls[0]?.[0]).toMatch(/\[DEBUG\] \[shown\] User\/$/);
    } finally {
      if (saved === undefined) {
        delete process.env.BLOBREPO_DEBUG;
      } else {
        process.env.BLOBREPO_DEBUG = saved;
      }
    }
  });
});
