import type { Request, Response } from "express";
import type { LogMetadata } from "../security/logger";
import type { ErrorManager, ErrorSeverity } from "./error-manager";
import {
  AuthenticationError,
  AuthorizationError,
  BusinessLogicError,
  CmsError,
  SecurityException,
  ValidationError
} from "./errors";
import type { PageRequest, Paginated } from "./pagination";

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;
/** Upper bound of the `integer` id columns; also caps OFFSET. */
export const MAX_ROW_ID = 2_147_483_647;
const MAX_SEARCH_LENGTH = 120;

export interface ErrorClassification {
  status: number;
  severity: ErrorSeverity;
}

interface ClassificationRule extends ErrorClassification {
  errorClass: new (message: string) => CmsError;
}

const CLASSIFICATION_RULES: ClassificationRule[] = [
  { errorClass: ValidationError, status: 400, severity: "medium" },
  { errorClass: AuthenticationError, status: 401, severity: "medium" },
  { errorClass: AuthorizationError, status: 403, severity: "medium" },
  { errorClass: BusinessLogicError, status: 422, severity: "medium" },
  { errorClass: SecurityException, status: 400, severity: "high" }
];

const UNCLASSIFIED: ErrorClassification = { status: 500, severity: "high" };

export function classifyError(error: unknown): ErrorClassification {
  const rule = CLASSIFICATION_RULES.find((candidate) => error instanceof candidate.errorClass);
  return rule ? { status: rule.status, severity: rule.severity } : UNCLASSIFIED;
}

/** Client-facing text for 4xx errors; 5xx falls back to the severity default. */
export function outwardMessage(error: unknown, classification: ErrorClassification): string | undefined {
  if (classification.status >= 500 || !(error instanceof CmsError)) {
    return undefined;
  }
  return error.userMessage ?? error.message;
}

export function respondWithError(
  res: Response,
  error: unknown,
  errorManager: ErrorManager,
  metadata: LogMetadata
): void {
  const classification = classifyError(error);
  const record = errorManager.handle(
    error,
    classification.severity,
    {
      ...metadata,
      statusCode: classification.status,
      details: error instanceof CmsError ? error.details : undefined
    },
    outwardMessage(error, classification)
  );

  res.status(classification.status).json({
    success: false,
    error: record,
    status_code: classification.status
  });
}

export function respondWithData(res: Response, statusCode: number, data: unknown): void {
  res.status(statusCode).json({ success: true, data, status_code: statusCode });
}

export function respondWithMessage(res: Response, statusCode: number, message: string): void {
  res.status(statusCode).json({ success: false, error: { message }, status_code: statusCode });
}

export function respondNotFound(res: Response, message = "Not found"): void {
  respondWithMessage(res, 404, message);
}

export function serializePagination(page: Paginated<unknown>) {
  return {
    skip: page.skip,
    limit: page.limit,
    total: page.total,
    has_next: page.hasNext
  };
}

function firstQueryValue(rawValue: unknown): unknown {
  return Array.isArray(rawValue) ? rawValue[0] : rawValue;
}

function parseNonNegativeInteger(name: string, rawValue: unknown, max?: number): number | undefined {
  if (rawValue === undefined) {
    return undefined;
  }

  const value = firstQueryValue(rawValue);
  if (typeof value !== "string" || !/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }

  const parsed = Number(value);
  if (max !== undefined && parsed > max) {
    throw new ValidationError(`${name} must be ${max} or less`);
  }

  return parsed;
}

export function parsePageRequest(req: Request, defaultLimit = DEFAULT_PAGE_LIMIT): PageRequest {
  const skip = parseNonNegativeInteger("skip", req.query.skip, MAX_ROW_ID) ?? 0;
  const requestedLimit = parseNonNegativeInteger("limit", req.query.limit);
  const limit = Math.min(Math.max(requestedLimit ?? defaultLimit, 1), MAX_PAGE_LIMIT);
  return { skip, limit };
}

export function parseBooleanQuery(req: Request, name: string, defaultValue: boolean): boolean {
  const rawValue = req.query[name];
  if (rawValue === undefined) {
    return defaultValue;
  }

  const value = firstQueryValue(rawValue);
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }

  throw new ValidationError(`${name} must be true or false`);
}

export function parseSearchQuery(req: Request): string | undefined {
  const rawValue = req.query.q;
  if (rawValue === undefined) {
    return undefined;
  }

  const value = firstQueryValue(rawValue);
  if (typeof value !== "string") {
    throw new ValidationError("q filter is invalid");
  }

  const normalized = value.trim();
  if (normalized.length === 0) {
    return undefined;
  }

  if (normalized.length > MAX_SEARCH_LENGTH) {
    throw new ValidationError(`q must be ${MAX_SEARCH_LENGTH} characters or less`);
  }

  return normalized;
}

export function parseIdParam(req: Request, name = "id"): number {
  const rawValue = req.params[name];
  const value = Array.isArray(rawValue) ? rawValue[0] : rawValue;
  const parsed = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : Number.NaN;

  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
  if (parsed > MAX_ROW_ID) {
    throw new ValidationError(`${name} must be ${MAX_ROW_ID} or less`);
  }

  return parsed;
}

export function readStringParam(req: Request, name: string): string {
  const rawValue = req.params[name];
  const value = Array.isArray(rawValue) ? rawValue[0] : rawValue;
  return value ?? "";
}
