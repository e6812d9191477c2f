import { randomUUID } from "node:crypto";
import type { LogMetadata, Logger } from "../security/logger";

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

export interface ErrorRecord {
  error_id: string;
  message: string;
  severity: ErrorSeverity;
  timestamp: string;
  type: string;
}

export const DEFAULT_ERROR_MESSAGES: Record<ErrorSeverity, string> = {
  low: "A minor issue occurred. Please try again.",
  medium: "An error occurred while processing your request.",
  high: "A serious error occurred. Please contact support.",
  critical: "A critical system error occurred. Please contact support immediately."
};

export interface ErrorManagerOptions {
  now?: () => Date;
  generateToken?: () => string;
}

function describeError(error: unknown): { type: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { type: error.name || error.constructor.name, message: error.message, stack: error.stack };
  }

  return { type: typeof error, message: String(error) };
}

function formatCompactDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

export function formatErrorTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Turns a raised error into the record a client sees and the log line an
 * operator sees. One instance is shared per process and injected where needed.
 */
export class ErrorManager {
  private readonly now: () => Date;
  private readonly generateToken: () => string;

  constructor(
    private readonly logger: Logger,
    options: ErrorManagerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateToken = options.generateToken ?? (() => randomUUID().slice(0, 8));
  }

  handle(error: unknown, severity: ErrorSeverity, context: LogMetadata = {}, userMessage?: string): ErrorRecord {
    const occurredAt = this.now();
    const errorId = `error_${formatCompactDate(occurredAt)}_${this.generateToken()}`;
    const described = describeError(error);

    this.log(severity, {
      error_id: errorId,
      error_type: described.type,
      error_message: described.message,
      severity,
      context,
      stack: described.stack
    });

    return {
      error_id: errorId,
      message: userMessage ?? DEFAULT_ERROR_MESSAGES[severity],
      severity,
      timestamp: formatErrorTimestamp(occurredAt),
      type: described.type
    };
  }

  private log(severity: ErrorSeverity, entry: LogMetadata & { stack?: string }): void {
    if (severity === "critical" || severity === "high") {
      this.logger.error("cms_error", entry);
      return;
    }

    const { stack: _stack, ...withoutStack } = entry;
    if (severity === "medium") {
      this.logger.warn("cms_error", withoutStack);
      return;
    }

    this.logger.info("cms_error", withoutStack);
  }
}
