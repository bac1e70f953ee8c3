import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createCorrelatedLogger, logDataQualityIssue, Logger } from "./logger";

const lastEntry = (spy: { mock: { calls: unknown[][] } }): Record<string, unknown> =>
  JSON.parse(String(spy.mock.calls[spy.mock.calls.length - 1][0]));

describe("Logger", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write structured JSON entries", () => {
    new Logger("TestService", { component: "unit" }, "DEBUG").info("Hello", { operation: "greet" });

    expect(lastEntry(vi.mocked(console.info))).toMatchObject({
      level: "INFO",
      service: "TestService",
      message: "Hello",
      component: "unit",
      operation: "greet",
    });
  });

  it("should drop entries below the minimum level", () => {
    const logger = new Logger("TestService", {}, "WARN");

    logger.info("quiet");
    logger.warn("loud");

    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("should merge child context over the parent's", () => {
    const child = new Logger("TestService", { filePath: "a.csv" }, "DEBUG").child({
      formatName: "insurance_claims",
    });

    child.info("child entry");

    expect(lastEntry(vi.mocked(console.info))).toMatchObject({ filePath: "a.csv", formatName: "insurance_claims" });
  });

  it("should expand errors", () => {
    new Logger("TestService", {}, "DEBUG").error("Failed", new Error("boom"), { operation: "x" });

    expect(lastEntry(vi.mocked(console.error))).toMatchObject({
      level: "ERROR",
      message: "Failed",
      operation: "x",
      error: { name: "Error", message: "boom" },
    });
  });

  it("should attach the correlation id", () => {
    createCorrelatedLogger("rnorm-test-1").error("tagged");

    expect(lastEntry(vi.mocked(console.error))).toMatchObject({ correlationId: "rnorm-test-1" });
  });

  it("should log data quality issues as warnings", () => {
    logDataQualityIssue("transformed_data", "provider_name", "Missing 2 values", 2);

    expect(lastEntry(vi.mocked(console.warn))).toMatchObject({
      service: "DataQuality",
      message: "transformed_data.provider_name: Missing 2 values (2 rows affected)",
      operation: "data_quality_issue",
      table: "transformed_data",
      column: "provider_name",
      count: 2,
    });
  });

  it("should omit the count when none is given", () => {
    logDataQualityIssue("transformed_data", "notes", "Free text");

    expect(lastEntry(vi.mocked(console.warn)).message).toBe("transformed_data.notes: Free text");
  });
});
