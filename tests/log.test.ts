import { afterEach, describe, expect, it, vi } from "vitest";
import { getLogLevel, logger, parseLogLevel, setLogLevel } from "../src/utils/log.js";

describe("logger", () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it("parses known levels and falls back otherwise", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });

  it("drops messages below the current level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    setLogLevel("warn");

    logger.info("hidden");
    logger.warn("careful");
    logger.error("broken");

    expect(warn).toHaveBeenCalledWith("[warn] careful");
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith("[error] broken");
  });

  it("is quiet when silent", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("silent");

    logger.error("nothing");

    expect(stderr).not.toHaveBeenCalled();
  });
});
