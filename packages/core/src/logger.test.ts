/**
 * Unit tests for logger.ts
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { createConsoleLogger, NOOP_LOGGER } from "./logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    createConsoleLogger("Config").info("loaded", { keys: 2 });
    expect(info).toHaveBeenCalledWith("[Config] loaded", { keys: 2 });
  });

  it("drops messages below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createConsoleLogger("Config", "warn");
    logger.debug("hidden");
    logger.warn("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Config] shown", "");
  });

  it("defaults to the Reflect prefix", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createConsoleLogger().error("failed");
    expect(error).toHaveBeenCalledWith("[Reflect] failed", "");
  });
});

describe("NOOP_LOGGER", () => {
  it("writes nothing", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    NOOP_LOGGER.info("ignored");
    expect(info).not.toHaveBeenCalled();
    vi.restoreAllMocks();
  });
});
