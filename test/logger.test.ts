import { describe, expect, it } from "vitest";
import type { Request } from "express";
import {
  buildSafeRequestLogMetadata,
  createConsoleLogger,
  formatLogLine,
  sanitizeLogMetadata
} from "../src/security/logger";

describe("sanitizeLogMetadata", () => {
  it("redacts article bodies, passwords and csrf tokens", () => {
    const metadata = sanitizeLogMetadata({
      articleId: 12,
      content: "<p>draft body</p>",
      password: "Str0ng!pass",
      nested: {
        csrf_token: "csrf-token-123456",
        ok: true
      }
    });

    expect(metadata).toEqual({
      articleId: 12,
      content: "[REDACTED]",
      password: "[REDACTED]",
      nested: {
        csrf_token: "[REDACTED]",
        ok: true
      }
    });
  });

  it("redacts authorization, cookie and csrf headers", () => {
    const metadata = sanitizeLogMetadata({
      headers: {
        authorization: "Bearer secret",
        cookie: "session=secret",
        "x-csrf-token": "csrf-token-123456",
        "x-user-id": "7"
      }
    });

    expect(metadata).toEqual({
      headers: {
        authorization: "[REDACTED]",
        cookie: "[REDACTED]",
        "x-csrf-token": "[REDACTED]",
        "x-user-id": "7"
      }
    });
  });

  it("reduces errors to their name and message", () => {
    expect(sanitizeLogMetadata({ error: new TypeError("bad input") })).toEqual({
      error: { name: "TypeError", message: "bad input" }
    });
  });
});

describe("buildSafeRequestLogMetadata", () => {
  it("omits request body and redacts sensitive headers", () => {
    const metadata = buildSafeRequestLogMetadata({
      method: "POST",
      originalUrl: "/api/articles",
      url: "/api/articles",
      ip: "127.0.0.1",
      headers: {
        authorization: "Bearer secret",
        "x-user-id": "1"
      }
    } as unknown as Request);

    expect(metadata).toEqual({
      method: "POST",
      path: "/api/articles",
      ip: "127.0.0.1",
      headers: {
        authorization: "[REDACTED]",
        "x-user-id": "1"
      }
    });
    expect("body" in metadata).toBe(false);
  });
});

describe("console logger", () => {
  it("formats one JSON object per event", () => {
    const line = formatLogLine("warn", "cms_error", { error_id: "error_20260101_abcdef12" }, new Date("2026-01-02T03:04:05.000Z"));

    expect(JSON.parse(line)).toEqual({
      level: "warn",
      timestamp: "2026-01-02T03:04:05.000Z",
      event: "cms_error",
      metadata: { error_id: "error_20260101_abcdef12" }
    });
  });

  it("routes each level to its writer", () => {
    const written: string[] = [];
    const logger = createConsoleLogger({
      info: (line) => written.push(`info:${JSON.parse(line).event}`),
      warn: (line) => written.push(`warn:${JSON.parse(line).event}`),
      error: (line) => written.push(`error:${JSON.parse(line).event}`)
    });

    logger.info("a");
    logger.warn("b");
    logger.error("c");

    expect(written).toEqual(["info:a", "warn:b", "error:c"]);
  });
});
