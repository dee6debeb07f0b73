/**
 * Unit tests for the stderr logger and metrics registry
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, errorCodeOf, parseLogLevel } from "../../observability/logger.js";
import { MetricsRegistry } from "../../observability/metrics.js";
import { ToolTimeoutError } from "../../tools.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("should write JSON lines to stderr", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    new Logger("info").warn("store.slow", { duration_ms: 12 });

    expect(stderr).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: "warn", event: "store.slow", duration_ms: 12 });
    expect(typeof line.ts).toBe("string");
  });

  it("should drop events below the minimum level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("warn");
    logger.debug("a");
    logger.info("b");
    expect(stderr).not.toHaveBeenCalled();
  });

  it("should not let fields override the envelope", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    new Logger("debug").debug("real", { event: "fake", level: "error" });
    const line = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(line.event).toBe("real");
    expect(line.level).toBe("debug");
  });

  it("should log tool failures with their error code", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    new Logger().toolCall("list_todos", 5000, false, new ToolTimeoutError("list_todos", 5000));
    const line = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: "error",
      event: "tool.error",
      tool: "list_todos",
      duration_ms: 5000,
      err_code: "ETIMEDOUT",
      err_message: "Tool execution timeout after 5000ms",
    });
  });
});

describe("parseLogLevel", () => {
  it("should accept known levels and default to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("error")).toBe("error");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});

describe("errorCodeOf", () => {
  it("should read string and numeric codes", () => {
    expect(errorCodeOf(Object.assign(new Error("x"), { code: "EACCES" }))).toBe("EACCES");
    expect(errorCodeOf(Object.assign(new Error("x"), { code: -32602 }))).toBe("-32602");
    expect(errorCodeOf(new Error("x"))).toBeUndefined();
    expect(errorCodeOf("EACCES")).toBeUndefined();
  });
});

describe("MetricsRegistry", () => {
  it("should count by name and labels", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "get_todo" });
    registry.inc("calls", { tool: "get_todo" });
    registry.inc("calls", { tool: "list_todos" });

    expect(registry.getCounter("calls", { tool: "get_todo" })).toBe(2);
    expect(registry.getCounter("calls", { tool: "list_todos" })).toBe(1);
    expect(registry.getCounter("calls")).toBe(0);
  });

  it("should ignore label order", () => {
    const registry = new MetricsRegistry();
    registry.inc("errors", { tool: "get_todo", err_code: "E_BAD_ID" });
    expect(registry.getCounter("errors", { err_code: "E_BAD_ID", tool: "get_todo" })).toBe(1);
  });

  it("should report percentiles", () => {
    const registry = new MetricsRegistry();
    for (let i = 1; i <= 100; i++) {
      registry.observe("latency", i);
    }
    expect(registry.getHistogram("latency")).toEqual({ count: 100, sum: 5050, p50: 50, p95: 95, p99: 99 });
    expect(registry.getHistogram("missing")).toBeNull();
  });

  it("should keep a bounded window of observations", () => {
    const registry = new MetricsRegistry();
    registry.observe("latency", 500);
    for (let i = 0; i < 1000; i++) {
      registry.observe("latency", 1);
    }
    expect(registry.getHistogram("latency")).toMatchObject({ count: 1000, sum: 1000, p99: 1 });
  });

  it("should snapshot every series", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "get_todo" });
    registry.observe("latency", 3, { tool: "get_todo" });

    expect(registry.snapshot()).toEqual({
      counters: { 'calls{tool="get_todo"}': 1 },
      histograms: { 'latency{tool="get_todo"}': { count: 1, sum: 3, p50: 3, p95: 3, p99: 3 } },
    });

    registry.reset();
    expect(registry.snapshot()).toEqual({ counters: {}, histograms: {} });
  });
});
