import type { NextFunction, Request, Response } from "express";
import type { ErrorManager } from "../cms/error-manager";
import { SecurityException } from "../cms/errors";
import { respondWithError } from "../cms/http";

const MUTATING_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);
export const MIN_CSRF_TOKEN_LENGTH = 16;

export function createRequireCsrfToken(errorManager: ErrorManager) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!MUTATING_METHODS.has(req.method)) {
      next();
      return;
    }

    const token = req.header("x-csrf-token");
    if (!token || token.length < MIN_CSRF_TOKEN_LENGTH) {
      respondWithError(res, new SecurityException("Invalid CSRF token"), errorManager, {
        route: req.path,
        method: req.method,
        actorId: req.auth?.userId
      });
      return;
    }

    next();
  };
}
