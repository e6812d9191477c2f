import { Router, type Request, type Response } from "express";
import { assertStaff, getAuthContext } from "../middleware/auth";
import type { ArticleRecord, ArticleView } from "./article-repository";
import type { ArticleService } from "./article-service";
import { createCmsGuards, type RouterContext } from "./guards";
import {
  parseBooleanQuery,
  parseIdParam,
  parsePageRequest,
  parseSearchQuery,
  readStringParam,
  respondNotFound,
  respondWithData,
  respondWithError,
  serializePagination
} from "./http";
import { publishStateOf } from "./publish-state";

export function toArticleResponse(article: ArticleRecord) {
  return {
    id: article.id,
    title: article.title,
    slug: article.slug,
    content: article.content,
    excerpt: article.excerpt,
    status: publishStateOf(article),
    is_published: article.isPublished,
    published_at: article.publishedAt,
    author_id: article.authorId,
    category_id: article.categoryId,
    created_at: article.createdAt,
    updated_at: article.updatedAt
  };
}

export function toArticleListItem(article: ArticleView) {
  return {
    id: article.id,
    title: article.title,
    slug: article.slug,
    excerpt: article.excerpt,
    author: article.authorName,
    category: article.categoryName,
    is_published: article.isPublished,
    published_at: article.publishedAt,
    created_at: article.createdAt
  };
}

function toArticleDetail(article: ArticleView) {
  return {
    ...toArticleResponse(article),
    author: article.authorName,
    category: article.categoryName
  };
}

export function createArticleRouter(context: RouterContext, articleService: ArticleService): Router {
  const router = Router();
  const { logger, errorManager, users } = context;
  const guards = createCmsGuards(context, "articles");
  const writeGuards = [guards.requireAuthenticated, guards.requireCsrfToken, guards.writeRateLimiter];

  router.get("/", guards.readRateLimiter, async (req: Request, res: Response) => {
    try {
      const publishedOnly = parseBooleanQuery(req, "published_only", true);
      if (!publishedOnly) {
        await assertStaff(users, req);
      }

      const page = await articleService.listArticles({
        ...parsePageRequest(req),
        publishedOnly,
        search: parseSearchQuery(req)
      });

      respondWithData(res, 200, {
        articles: page.items.map(toArticleListItem),
        pagination: serializePagination(page)
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "list_articles", actorId: req.auth?.userId });
    }
  });

  router.post("/", ...writeGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      const article = await articleService.createArticle(req.body, actorId);

      logger.info("article_created", { actorId, articleId: article.id, status: publishStateOf(article) });

      respondWithData(res, 201, {
        article: toArticleResponse(article),
        message: "Article created successfully"
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "create_article", actorId });
    }
  });

  router.get("/:slug", guards.readRateLimiter, async (req: Request, res: Response) => {
    const slug = readStringParam(req, "slug");

    try {
      const article = await articleService.getPublishedArticleBySlug(slug);
      if (!article) {
        respondNotFound(res, "Article not found");
        return;
      }

      respondWithData(res, 200, { article: toArticleDetail(article) });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "get_article", slug });
    }
  });

  router.put("/:id", ...writeGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;
    let articleId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      articleId = parseIdParam(req);
      const article = await articleService.updateArticle(articleId, req.body, actorId);

      logger.info("article_updated", { actorId, articleId });

      respondWithData(res, 200, {
        article: toArticleResponse(article),
        message: "Article updated successfully"
      });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "update_article", actorId, articleId });
    }
  });

  router.post("/:id/publish", ...writeGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;
    let articleId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      articleId = parseIdParam(req);
      const article = await articleService.publishArticle(articleId, actorId);

      logger.info("article_published", { actorId, articleId, publishedAt: article.publishedAt });

      respondWithData(res, 200, { article: toArticleResponse(article) });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "publish_article", actorId, articleId });
    }
  });

  router.post("/:id/unpublish", ...writeGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;
    let articleId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      articleId = parseIdParam(req);
      const article = await articleService.unpublishArticle(articleId, actorId);

      logger.info("article_unpublished", { actorId, articleId });

      respondWithData(res, 200, { article: toArticleResponse(article) });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "unpublish_article", actorId, articleId });
    }
  });

  router.delete("/:id", ...writeGuards, async (req: Request, res: Response) => {
    let actorId: number | undefined;
    let articleId: number | undefined;

    try {
      actorId = getAuthContext(req).userId;
      articleId = parseIdParam(req);
      await articleService.deleteArticle(articleId, actorId);

      logger.info("article_deleted", { actorId, articleId });

      respondWithData(res, 200, { message: "Article deleted successfully" });
    } catch (error) {
      respondWithError(res, error, errorManager, { route: "delete_article", actorId, articleId });
    }
  });

  return router;
}
