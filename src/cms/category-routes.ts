import { Router, type Request, type Response } from "express";
import { getAuthContext } from "../middleware/auth";
import { toArticleListItem } from "./article-routes";
import type { ArticleService } from "./article-service";
import type { CategoryRecord } from "./category-repository";
import type { CategoryService } from "./category-service";
import { createCmsGuards, type RouterContext } from "./guards";
import {
  MAX_PAGE_LIMIT,
  parseBooleanQuery,
  parseIdParam,
  parsePageRequest,
  readStringParam,
  respondNotFound,
  respondWithData,
  respondWithError,
  serializePagination
} from "./http";

function toCategoryResponse(category: CategoryRecord) {
  return {
    id: category.id,
    name: category.name,
    slug: category.slug,
    description: category.description,
    is_active: category.isActive,
    created_at: category.createdAt,
    updated_at: category.updatedAt
  };
}

export function createCategoryRouter(
  context: RouterContext,
  categoryService: CategoryService,
  articleService: ArticleService
): Router {
  const router = Router();
  const { logger, errorManager } = context;
  const guards = createCmsGuards(context, "categories");
  const staffWriteGuards = [
    guards.requireAuthenticated,
    guards.requireCsrfToken,
    guards.requireStaff,
    guards.writeRateLimiter
  ];

  router.get("/", guards.readRateLimiter, async (req: Request, res: Response) => {
    try {
      const page = await categoryService.listCategories({
        ...parsePageRequest(req, MAX_PAGE_LIMIT),
        activeOnly: parseBooleanQuery(req, "active_only", true)
      });

      respondWithData(res, 200, {
        categories: page.items.map(toCategoryResponse),
        pagination: serializePagination(page)
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "list_categories" });
    }
  });

  router.post("/", ...staffWriteGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      const category = await categoryService.createCategory(req.body);

      logger.info("category_created", { actorId, categoryId: category.id, slug: category.slug });

      respondWithData(res, 201, {
        category: toCategoryResponse(category),
        message: "Category created successfully"
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "create_category", actorId });
    }
  });

  router.put("/:id", ...staffWriteGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;
    let categoryId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      categoryId = parseIdParam(req);
      const category = await categoryService.updateCategory(categoryId, req.body);

      logger.info("category_updated", { actorId, categoryId });

      respondWithData(res, 200, {
        category: toCategoryResponse(category),
        message: "Category updated successfully"
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "update_category", actorId, categoryId });
    }
  });

  router.get("/:slug", guards.readRateLimiter, async (req: Request, res: Response) => {
    const slug = readStringParam(req, "slug");

    try {
      const category = await categoryService.getActiveCategoryBySlug(slug);
      if (!category) {
        respondNotFound(res, "Category not found");
        return;
      }

      respondWithData(res, 200, { category: toCategoryResponse(category) });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "get_category", slug });
    }
  });

  router.get("/:slug/articles", guards.readRateLimiter, async (req: Request, res: Response) => {
    const slug = readStringParam(req, "slug");

    try {
      const result = await articleService.listArticlesByCategory(slug, parsePageRequest(req));
      if (!result) {
        respondNotFound(res, "Category not found");
        return;
      }

      respondWithData(res, 200, {
        category: toCategoryResponse(result.category),
        articles: result.articles.items.map(toArticleListItem),
        pagination: serializePagination(result.articles)
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "list_category_articles", slug });
    }
  });

  return router;
}
