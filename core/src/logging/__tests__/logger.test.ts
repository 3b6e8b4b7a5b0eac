/**
 * Tests for logger.ts
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createLogger, silentLogger } from "../logger.js";

describe("createLogger", () => {
  let consoleSpy: {
    log: ReturnType<typeof jest.spyOn>;
    warn: ReturnType<typeof jest.spyOn>;
    error: ReturnType<typeof jest.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, "log").mockImplementation(() => {}),
      warn: jest.spyOn(console, "warn").mockImplementation(() => {}),
      error: jest.spyOn(console, "error").mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
  });

  it("returns the silent logger by default", () => {
    const logger = createLogger();
    logger.log("test");
    logger.warn("test");
    logger.error("test");

    expect(logger).toBe(silentLogger);
    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.warn).not.toHaveBeenCalled();
    expect(consoleSpy.error).not.toHaveBeenCalled();
  });

  it("routes each level to its console method when silent: false", () => {
    const logger = createLogger({ silent: false });
    logger.log("hello");
    logger.warn("careful");
    logger.error("broken");

    expect(consoleSpy.log).toHaveBeenCalledWith("hello");
    expect(consoleSpy.warn).toHaveBeenCalledWith("careful");
    expect(consoleSpy.error).toHaveBeenCalledWith("broken");
  });

  it("joins the prefix onto a leading string argument", () => {
    const logger = createLogger({ silent: false, prefix: "[Monitor]" });
    logger.log("tick", 3);
    expect(consoleSpy.log).toHaveBeenCalledWith("[Monitor] tick", 3);
  });

  it("prepends the prefix as its own argument for non-string messages", () => {
    const logger = createLogger({ silent: false, prefix: "[Monitor]" });
    const payload = { targets: 2 };
    logger.warn(payload);
    expect(consoleSpy.warn).toHaveBeenCalledWith("[Monitor]", payload);
  });
});
