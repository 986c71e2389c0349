/**
 * Tests for the logger
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  configureLogger,
  createLogger,
  getLoggerConfig,
  resetLogger,
} from "../logger.js";

describe("Logger", () => {
  afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
  });

  it("should be disabled by default", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createLogger("client");
    logger.debug("hidden");
    logger.error("hidden");

    expect(getLoggerConfig().level).toBe("none");
    expect(debugSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("should tag messages with the package and module", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    configureLogger({ level: "error" });

    createLogger("pricing").error("bad counters", { prompt_tokens: "x" });

    expect(errorSpy).toHaveBeenCalledWith(
      "[pplx-query:pricing] bad counters",
      { prompt_tokens: "x" },
    );
  });

  it("should drop records below the configured level", () => {
    const custom = vi.fn();
    configureLogger({ level: "warn", custom });

    const logger = createLogger("config");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(custom.mock.calls).toEqual([
      ["warn", "[pplx-query:config] w"],
      ["error", "[pplx-query:config] e"],
    ]);
  });

  it("should pick up configuration changes after the logger was created", () => {
    const custom = vi.fn();
    const logger = createLogger("client");

    logger.info("before");
    configureLogger({ level: "info", custom });
    logger.info("after");

    expect(custom).toHaveBeenCalledTimes(1);
    expect(custom).toHaveBeenCalledWith("info", "[pplx-query:client] after");
  });
});
