import type { NextFunction, Request, Response } from "express";
import { respondWithMessage } from "../cms/http";
import type { AppConfig, RateLimitConfig } from "../config";

interface RateLimitWindow {
  count: number;
  resetAt: number;
}

export interface RateLimitStoreResult {
  count: number;
  resetAt: number;
}

export interface RateLimitStore {
  increment(key: string, windowMs: number, nowMs: number): RateLimitStoreResult;
}

export interface RateLimitMiddlewareOptions {
  enabled: boolean;
  keyPrefix: string;
  limit: number;
  windowMs?: number;
  store: RateLimitStore;
  resolveIdentity?: (req: Request) => string;
  onLimited?: (req: Request, bucketKey: string) => void;
  now?: () => number;
}

const DEFAULT_WINDOW_MS = 60_000;
const DEFAULT_MAX_ENTRIES = 5_000;
const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  enabled: true,
  readPerMinute: 120,
  writePerMinute: 30
};

function resolveIp(req: Request): string {
  const ips = req.ips;
  if (Array.isArray(ips) && ips.length > 0) {
    return ips[0] ?? req.ip ?? "unknown";
  }

  return req.ip ?? "unknown";
}

export function resolveRateLimitConfig(config: AppConfig): RateLimitConfig {
  return {
    enabled: config.rateLimit?.enabled ?? DEFAULT_RATE_LIMITS.enabled,
    readPerMinute: config.rateLimit?.readPerMinute ?? DEFAULT_RATE_LIMITS.readPerMinute,
    writePerMinute: config.rateLimit?.writePerMinute ?? DEFAULT_RATE_LIMITS.writePerMinute
  };
}

export function resolveRateLimitIdentity(req: Request): string {
  const userId = req.auth?.userId;
  if (userId !== undefined) {
    return `user:${userId}`;
  }

  return `ip:${resolveIp(req)}`;
}

/** Fixed one-window-per-key counter; expired windows are swept once the map reaches `maxEntries`. */
export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>();
  private readonly maxEntries: number;

  constructor(maxEntries = DEFAULT_MAX_ENTRIES) {
    this.maxEntries = Math.max(100, maxEntries);
  }

  increment(key: string, windowMs: number, nowMs: number): RateLimitStoreResult {
    const current = this.windows.get(key);
    if (current && current.resetAt > nowMs) {
      current.count += 1;
      return { ...current };
    }

    if (!current && this.windows.size >= this.maxEntries) {
      this.evict(nowMs);
    }

    const fresh = { count: 1, resetAt: nowMs + windowMs };
    this.windows.set(key, fresh);
    return { ...fresh };
  }

  private evict(nowMs: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= nowMs) {
        this.windows.delete(key);
      }
    }

    // Still full: drop the oldest insertion.
    const oldestKey = this.windows.size >= this.maxEntries ? this.windows.keys().next().value : undefined;
    if (oldestKey !== undefined) {
      this.windows.delete(oldestKey);
    }
  }
}

export function createRateLimitMiddleware(options: RateLimitMiddlewareOptions) {
  const windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
  const resolveIdentity = options.resolveIdentity ?? resolveRateLimitIdentity;
  const now = options.now ?? (() => Date.now());

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!options.enabled || options.limit <= 0) {
      next();
      return;
    }

    const nowMs = now();
    const identity = resolveIdentity(req);
    const bucketKey = `${options.keyPrefix}:${identity}`;
    const currentWindow = options.store.increment(bucketKey, windowMs, nowMs);
    const remaining = Math.max(0, options.limit - currentWindow.count);
    const resetInSeconds = Math.max(1, Math.ceil((currentWindow.resetAt - nowMs) / 1000));

    res.setHeader("RateLimit-Limit", String(options.limit));
    res.setHeader("RateLimit-Remaining", String(remaining));
    res.setHeader("RateLimit-Reset", String(resetInSeconds));

    if (currentWindow.count > options.limit) {
      options.onLimited?.(req, bucketKey);
      res.setHeader("Retry-After", String(resetInSeconds));
      respondWithMessage(res, 429, "Too many requests");
      return;
    }

    next();
  };
}
