import { describe, expect, it } from "vitest";
import { DEFAULT_ERROR_MESSAGES, ErrorManager, formatErrorTimestamp } from "../src/cms/error-manager";
import { BusinessLogicError, ValidationError } from "../src/cms/errors";
import { createRecordingLogger } from "./helpers";

const fixedNow = () => new Date("2026-03-04T05:06:07.890Z");

describe("ErrorManager.handle", () => {
  it("builds the outward record with an id, default message and second-precision timestamp", () => {
    const logger = createRecordingLogger();
    const manager = new ErrorManager(logger, { now: fixedNow, generateToken: () => "abcdef12" });

    const record = manager.handle(new ValidationError("title missing"), "medium", { operation: "article_creation" });

    expect(record).toEqual({
      error_id: "error_20260304_abcdef12",
      message: "An error occurred while processing your request.",
      severity: "medium",
      timestamp: "2026-03-04T05:06:07Z",
      type: "ValidationError"
    });
  });

  it("logs medium errors at warn without a stack and keeps context out of the record", () => {
    const logger = createRecordingLogger();
    const manager = new ErrorManager(logger, { now: fixedNow, generateToken: () => "abcdef12" });

    const record = manager.handle(new ValidationError("title missing"), "medium", { operation: "article_creation" });

    expect("context" in record).toBe(false);
    expect(logger.entries).toEqual([
      {
        level: "warn",
        event: "cms_error",
        metadata: {
          error_id: "error_20260304_abcdef12",
          error_type: "ValidationError",
          error_message: "title missing",
          severity: "medium",
          context: { operation: "article_creation" }
        }
      }
    ]);
  });

  it("logs high and critical errors at error level with the stack", () => {
    const logger = createRecordingLogger();
    const manager = new ErrorManager(logger);

    manager.handle(new Error("pool exhausted"), "high");
    manager.handle(new Error("disk full"), "critical");

    expect(logger.entries.map((entry) => entry.level)).toEqual(["error", "error"]);
    expect(logger.entries[0]?.metadata.stack).toEqual(expect.stringContaining("pool exhausted"));
  });

  it("logs low errors at info", () => {
    const logger = createRecordingLogger();
    const manager = new ErrorManager(logger);

    const record = manager.handle(new BusinessLogicError("already archived"), "low");

    expect(logger.entries[0]?.level).toBe("info");
    expect(record.message).toBe("A minor issue occurred. Please try again.");
  });

  it("prefers the caller's user message over the severity default", () => {
    const manager = new ErrorManager(createRecordingLogger());

    const record = manager.handle(new ValidationError("duplicate email"), "medium", {}, "Registration failed.");

    expect(record.message).toBe("Registration failed.");
  });

  it("generates a fresh id for every call", () => {
    const manager = new ErrorManager(createRecordingLogger());

    const first = manager.handle(new Error("a"), "high");
    const second = manager.handle(new Error("a"), "high");

    expect(first.error_id).toMatch(/^error_\d{8}_[0-9a-f]{8}$/);
    expect(second.error_id).toMatch(/^error_\d{8}_[0-9a-f]{8}$/);
    expect(first.error_id).not.toBe(second.error_id);
  });

  it("describes thrown values that are not errors by their runtime type", () => {
    const manager = new ErrorManager(createRecordingLogger());

    const record = manager.handle("boom", "critical");

    expect(record.type).toBe("string");
    expect(record.message).toBe("A critical system error occurred. Please contact support immediately.");
  });
});

describe("error defaults", () => {
  it("maps each severity to its client message", () => {
    expect(DEFAULT_ERROR_MESSAGES).toEqual({
      low: "A minor issue occurred. Please try again.",
      medium: "An error occurred while processing your request.",
      high: "A serious error occurred. Please contact support.",
      critical: "A critical system error occurred. Please contact support immediately."
    });
  });

  it("formats timestamps in UTC without fractional seconds", () => {
    expect(formatErrorTimestamp(new Date("2026-12-31T23:59:59.999Z"))).toBe("2026-12-31T23:59:59Z");
  });
});
