import { Router, type Request, type Response } from "express";
import { getAuthContext } from "../middleware/auth";
import type { AuthService } from "./auth-service";
import { createCmsGuards, type RouterContext } from "./guards";
import { respondWithData, respondWithError } from "./http";
import { fullName, type UserRecord } from "./user-repository";

function toUserSummary(user: UserRecord) {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    full_name: fullName(user)
  };
}

export function createAuthRouter(context: RouterContext, authService: AuthService): Router {
  const router = Router();
  const { logger, errorManager } = context;
  const guards = createCmsGuards(context, "auth");

  router.post("/register", guards.writeRateLimiter, async (req: Request, res: Response) => {
    try {
      const user = await authService.registerUser(req.body);

      logger.info("user_registered", { userId: user.id });

      respondWithData(res, 201, {
        user: toUserSummary(user),
        message: "User registered successfully"
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { operation: "user_registration" });
    }
  });

  router.post("/login", guards.writeRateLimiter, async (req: Request, res: Response) => {
    try {
      const user = await authService.authenticateUser(req.body);

      logger.info("user_authenticated", { userId: user.id });

      respondWithData(res, 200, {
        user: {
          ...toUserSummary(user),
          is_staff: user.isStaff,
          is_superuser: user.isSuperuser
        },
        message: "Authentication successful"
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { operation: "user_authentication" });
    }
  });

  router.post(
    "/password",
    guards.requireAuthenticated,
    guards.requireCsrfToken,
    guards.writeRateLimiter,
    async (req: Request, res: Response) => {
      let actorId: number | undefined;

      try {
        actorId = getAuthContext(req).userId;
        await authService.changePassword(actorId, req.body);

        logger.info("user_password_changed", { userId: actorId });

        respondWithData(res, 200, { message: "Password changed successfully" });
      } catch (error) {
        respondWithError(res, error, errorManager, { operation: "password_change", actorId });
      }
    }
  );

  return router;
}
