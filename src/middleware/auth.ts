import type { NextFunction, Request, Response } from "express";
import type { ErrorManager } from "../cms/error-manager";
import { AuthenticationError, AuthorizationError } from "../cms/errors";
import { MAX_ROW_ID, respondWithError } from "../cms/http";
import type { UserRecord, UserRepository } from "../cms/user-repository";
import type { AuthContext } from "../types/context";

const USER_ID_PATTERN = /^\d+$/;

function parseUserId(rawValue: string | undefined): number | undefined {
  const value = rawValue?.trim();
  if (!value || !USER_ID_PATTERN.test(value)) {
    return undefined;
  }

  const userId = Number(value);
  return userId > 0 && userId <= MAX_ROW_ID ? userId : undefined;
}

/** Identity is asserted by the upstream gateway through `x-user-id`. */
export function hydrateAuthFromHeaders(req: Request, _res: Response, next: NextFunction): void {
  const userId = parseUserId(req.header("x-user-id"));
  req.auth = userId === undefined ? undefined : { userId, isAuthenticated: true };
  next();
}

export function getAuthContext(req: Request): AuthContext {
  if (!req.auth) {
    throw new AuthenticationError("Authentication required");
  }
  return req.auth;
}

/** Resolves the caller to a stored, active account. */
export async function resolveActiveUser(users: Pick<UserRepository, "findById">, req: Request): Promise<UserRecord> {
  const { userId } = getAuthContext(req);
  const user = await users.findById(userId);

  if (!user || !user.isActive) {
    throw new AuthenticationError("Authentication required", { details: { userId } });
  }

  return user;
}

export function createRequireAuthenticated(users: Pick<UserRepository, "findById">, errorManager: ErrorManager) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await resolveActiveUser(users, req);
    } catch (error) {
      respondWithError(res, error, errorManager, {
        route: req.path,
        method: req.method,
        actorId: req.auth?.userId
      });
      return;
    }

    next();
  };
}

/** Staff status is read from the user store on every request, never from headers. */
export async function assertStaff(users: Pick<UserRepository, "findById">, req: Request): Promise<UserRecord> {
  const user = await resolveActiveUser(users, req);

  if (!user.isStaff) {
    throw new AuthorizationError("Staff access required", { details: { userId: user.id } });
  }

  return user;
}

export function createRequireStaff(users: Pick<UserRepository, "findById">, errorManager: ErrorManager) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await assertStaff(users, req);
    } catch (error) {
      respondWithError(res, error, errorManager, {
        route: req.path,
        method: req.method,
        actorId: req.auth?.userId
      });
      return;
    }

    next();
  };
}
