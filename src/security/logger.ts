import type { Request } from "express";

type LogValue = unknown;

export interface LogMetadata {
  [key: string]: LogValue;
}

const REDACTED = "[REDACTED]";
const MAX_DEPTH = 6;

const SENSITIVE_HEADER_KEYS = new Set([
  "authorization",
  "cookie",
  "set-cookie",
  "proxy-authorization",
  "x-api-key",
  "x-csrf-token"
]);

const SENSITIVE_KEY_PATTERN =
  /(authorization|cookie|password|passwd|secret|token|session|api[_-]?key|private[_-]?key|database[_-]?url|connection[_-]?string|credential|csrf|body|content|html|env)/i;

const SENSITIVE_ENV_KEY_PATTERN = /(key|token|secret|password|cookie|private|database_url|connection|credential|auth)/i;

const SENSITIVE_ENV_VALUES = collectSensitiveEnvValues();

function collectSensitiveEnvValues(): string[] {
  const values: string[] = [];

  for (const [key, value] of Object.entries(process.env)) {
    if (!value) {
      continue;
    }

    if (!SENSITIVE_ENV_KEY_PATTERN.test(key.toLowerCase())) {
      continue;
    }

    const normalized = value.trim();
    if (normalized.length < 6) {
      continue;
    }

    values.push(normalized);
  }

  return values;
}

function shouldRedactValueByEnvMatch(value: string): boolean {
  return SENSITIVE_ENV_VALUES.some((secretValue) => value.includes(secretValue));
}

function sanitizeHeaders(headers: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(headers)) {
    const lower = key.toLowerCase();
    if (SENSITIVE_HEADER_KEYS.has(lower)) {
      result[key] = REDACTED;
      continue;
    }

    result[key] = sanitizeValue(value, lower, 1);
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sanitizeObject(input: Record<string, unknown>, depth: number): Record<string, unknown> {
  const output: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    const keyLower = key.toLowerCase();

    if (SENSITIVE_KEY_PATTERN.test(keyLower)) {
      output[key] = REDACTED;
      continue;
    }

    if (keyLower === "headers" && isRecord(value)) {
      output[key] = sanitizeHeaders(value);
      continue;
    }

    output[key] = sanitizeValue(value, keyLower, depth + 1);
  }

  return output;
}

function sanitizeValue(value: unknown, key: string, depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return "[Truncated]";
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === "string") {
    return shouldRedactValueByEnvMatch(value) ? REDACTED : value;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message
    };
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, key, depth + 1));
  }

  if (isRecord(value)) {
    return sanitizeObject(value, depth + 1);
  }

  return String(value);
}

export function sanitizeLogMetadata(metadata: LogMetadata = {}): LogMetadata {
  return sanitizeObject(metadata, 0);
}

export function buildSafeRequestLogMetadata(req: Request): LogMetadata {
  return {
    method: req.method,
    path: req.originalUrl || req.url,
    ip: req.ip,
    headers: sanitizeHeaders(req.headers)
  };
}

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info: (event: string, metadata?: LogMetadata) => void;
  warn: (event: string, metadata?: LogMetadata) => void;
  error: (event: string, metadata?: LogMetadata) => void;
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

export function formatLogLine(level: LogLevel, event: string, metadata: LogMetadata = {}, now = new Date()): string {
  return JSON.stringify({
    level,
    timestamp: now.toISOString(),
    event,
    metadata: sanitizeLogMetadata(metadata)
  });
}

export function createConsoleLogger(writers: Record<LogLevel, (line: string) => void> = CONSOLE_WRITERS): Logger {
  return {
    info(event, metadata = {}) {
      writers.info(formatLogLine("info", event, metadata));
    },
    warn(event, metadata = {}) {
      writers.warn(formatLogLine("warn", event, metadata));
    },
    error(event, metadata = {}) {
      writers.error(formatLogLine("error", event, metadata));
    }
  };
}

export const appLogger: Logger = createConsoleLogger();
