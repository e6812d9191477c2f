import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "./config";
import { InMemoryArticleRepository, type ArticleRepository } from "./cms/article-repository";
import { createArticleRouter } from "./cms/article-routes";
import { ArticleService } from "./cms/article-service";
import { createAuthRouter } from "./cms/auth-routes";
import { AuthService } from "./cms/auth-service";
import { InMemoryCategoryRepository, type CategoryRepository } from "./cms/category-repository";
import { createCategoryRouter } from "./cms/category-routes";
import { CategoryService } from "./cms/category-service";
import { ErrorManager } from "./cms/error-manager";
import { ValidationError } from "./cms/errors";
import type { RouterContext } from "./cms/guards";
import { respondNotFound, respondWithError } from "./cms/http";
import { createSlugAssigner } from "./cms/slug";
import { InMemoryUserRepository, type UserRepository } from "./cms/user-repository";
import { hydrateAuthFromHeaders } from "./middleware/auth";
import { createApiSecurityHeaders } from "./security/headers";
import { appLogger, buildSafeRequestLogMetadata, type Logger } from "./security/logger";
import { createBcryptPasswordHasher, type PasswordHasher } from "./security/password";
import { InMemoryRateLimitStore, type RateLimitStore } from "./security/rate-limit";

export interface AppDependencies {
  logger?: Logger;
  errorManager?: ErrorManager;
  userRepository?: UserRepository;
  categoryRepository?: CategoryRepository;
  articleRepository?: ArticleRepository;
  passwordHasher?: PasswordHasher;
  rateLimitStore?: RateLimitStore;
  now?: () => Date;
  healthCheck?: () => Promise<void> | void;
}

function isMalformedJsonError(error: unknown): boolean {
  return error instanceof SyntaxError && "body" in error;
}

export function createApp(config: AppConfig, dependencies: AppDependencies = {}): Express {
  const app = express();
  const logger = dependencies.logger ?? appLogger;
  const errorManager = dependencies.errorManager ?? new ErrorManager(logger);
  const users = dependencies.userRepository ?? new InMemoryUserRepository();
  const categories = dependencies.categoryRepository ?? new InMemoryCategoryRepository();
  const articles = dependencies.articleRepository ?? new InMemoryArticleRepository({ users, categories });
  const passwordHasher = dependencies.passwordHasher ?? createBcryptPasswordHasher(config.passwordHashRounds);
  const rateLimitStore = dependencies.rateLimitStore ?? new InMemoryRateLimitStore();
  const healthCheck = dependencies.healthCheck ?? (() => undefined);

  const assignSlug = createSlugAssigner({ article: articles, category: categories });
  const authService = new AuthService({ users, passwordHasher, now: dependencies.now });
  const articleService = new ArticleService({ articles, categories, users, assignSlug, now: dependencies.now });
  const categoryService = new CategoryService({ categories, assignSlug });
  const routerContext: RouterContext = { config, logger, errorManager, rateLimitStore, users };

  app.disable("x-powered-by");
  app.use(express.json({ limit: "128kb" }));

  app.get("/healthz", async (_req, res) => {
    try {
      await healthCheck();
      res.status(200).json({ ok: true });
      return;
    } catch (error) {
      logger.warn("health_check_failed", { error });
      res.status(503).json({ ok: false });
    }
  });

  app.use("/api", createApiSecurityHeaders(config), hydrateAuthFromHeaders);
  app.use("/api/auth", createAuthRouter(routerContext, authService));
  app.use("/api/articles", createArticleRouter(routerContext, articleService));
  app.use("/api/categories", createCategoryRouter(routerContext, categoryService, articleService));

  app.use((_req, res) => {
    respondNotFound(res);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const normalized = isMalformedJsonError(error) ? new ValidationError("Request body must be valid JSON") : error;
    respondWithError(res, normalized, errorManager, buildSafeRequestLogMetadata(req));
  });

  return app;
}
