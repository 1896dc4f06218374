/**
 * Unit tests for the micro-logger
 *
 * LOG_LEVEL is unset in tests, so the default (info) applies.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as logger from "@/logger";

const LINE_PREFIX = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /;

describe("resolveLevel", () => {
  it("should accept known levels in any case", () => {
    expect(logger.resolveLevel("debug")).toBe("debug");
    expect(logger.resolveLevel(" WARN ")).toBe("warn");
  });

  it("should fall back to info", () => {
    expect(logger.resolveLevel(undefined)).toBe("info");
    expect(logger.resolveLevel("verbose")).toBe("info");
  });
});

describe("formatLine", () => {
  it("should append meta as JSON", () => {
    const line = logger.formatLine("warn", "Cache miss", { cacheKey: "items" });

    expect(line).toMatch(LINE_PREFIX);
    expect(line.replace(LINE_PREFIX, "")).toBe(
      '[WARN] Cache miss {"cacheKey":"items"}',
    );
  });

  it("should omit empty meta", () => {
    expect(logger.formatLine("info", "Ready", {}).replace(LINE_PREFIX, "")).toBe(
      "[INFO] Ready",
    );
  });
});

describe("level filtering", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write enabled levels to stderr only", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.debug("hidden");
    logger.info("shown");

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0]).replace(LINE_PREFIX, "")).toBe(
      "[INFO] shown",
    );
  });

  it("should merge bound context into every call", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger
      .withContext({ itemId: "T4_BAG", query: "t4 bag" })
      .warn("Price history unavailable", { status: 503, query: "override" });

    expect(String(stderr.mock.calls[0][0]).replace(LINE_PREFIX, "")).toBe(
      '[WARN] Price history unavailable {"itemId":"T4_BAG","query":"override","status":503}',
    );
  });
});
