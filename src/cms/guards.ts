import type { Request, RequestHandler } from "express";
import type { AppConfig } from "../config";
import { createRequireAuthenticated, createRequireStaff } from "../middleware/auth";
import { createRequireCsrfToken } from "../security/csrf";
import type { Logger } from "../security/logger";
import { createRateLimitMiddleware, resolveRateLimitConfig, type RateLimitStore } from "../security/rate-limit";
import type { ErrorManager } from "./error-manager";
import type { UserRepository } from "./user-repository";

export interface RouterContext {
  config: AppConfig;
  logger: Logger;
  errorManager: ErrorManager;
  rateLimitStore: RateLimitStore;
  users: UserRepository;
}

export interface CmsGuards {
  requireAuthenticated: RequestHandler;
  requireStaff: RequestHandler;
  requireCsrfToken: RequestHandler;
  readRateLimiter: RequestHandler;
  writeRateLimiter: RequestHandler;
}

/** Mutating routes run `requireAuthenticated`, then `requireCsrfToken`, then the write limiter. */
export function createCmsGuards(context: RouterContext, keyPrefix: string): CmsGuards {
  const rateLimitConfig = resolveRateLimitConfig(context.config);
  const onLimited = (req: Request, bucketKey: string) => {
    context.logger.warn("rate_limited", { bucketKey, method: req.method, path: req.originalUrl });
  };

  return {
    requireAuthenticated: createRequireAuthenticated(context.users, context.errorManager),
    requireStaff: createRequireStaff(context.users, context.errorManager),
    requireCsrfToken: createRequireCsrfToken(context.errorManager),
    readRateLimiter: createRateLimitMiddleware({
      enabled: rateLimitConfig.enabled,
      keyPrefix: `${keyPrefix}-read`,
      limit: rateLimitConfig.readPerMinute,
      store: context.rateLimitStore,
      onLimited
    }),
    writeRateLimiter: createRateLimitMiddleware({
      enabled: rateLimitConfig.enabled,
      keyPrefix: `${keyPrefix}-write`,
      limit: rateLimitConfig.writePerMinute,
      store: context.rateLimitStore,
      onLimited
    })
  };
}
