import { sanitizeArticleHtml } from "../security/html";
import type { ArticleChanges, ArticleRecord, ArticleRepository, ArticleView } from "./article-repository";
import type { CategoryRecord, CategoryRepository } from "./category-repository";
import { AuthorizationError, BusinessLogicError, ValidationError } from "./errors";
import { toPaginated, type PageRequest, type Paginated } from "./pagination";
import { INITIAL_PUBLISH_FIELDS, resolvePublishTransition } from "./publish-state";
import { persistWithSlugRetry, type AssignSlug } from "./slug";
import type { UserRepository } from "./user-repository";
import {
  articleCreateSchema,
  articleUpdateSchema,
  optionalTrimmedText,
  parseBody,
  requireTrimmedText,
  TITLE_MAX_LENGTH
} from "./validation";

export interface ArticleServiceDependencies {
  articles: ArticleRepository;
  categories: CategoryRepository;
  users: UserRepository;
  assignSlug: AssignSlug;
  now?: () => Date;
}

export interface ListArticlesOptions extends PageRequest {
  publishedOnly: boolean;
  search?: string;
}

export interface CategoryArticles {
  category: CategoryRecord;
  articles: Paginated<ArticleView>;
}

type ArticleAction = "edit" | "publish" | "unpublish" | "delete";

function requireTitle(title: string): string {
  return requireTrimmedText(title, "Title is required", TITLE_MAX_LENGTH, `Title must be ${TITLE_MAX_LENGTH} characters or less`);
}

function requireContent(content: string): string {
  if (content.trim().length === 0) {
    throw new ValidationError("Content is required");
  }
  return sanitizeArticleHtml(content);
}

export class ArticleService {
  private readonly articles: ArticleRepository;
  private readonly categories: CategoryRepository;
  private readonly users: UserRepository;
  private readonly assignSlug: AssignSlug;
  private readonly now: () => Date;

  constructor(dependencies: ArticleServiceDependencies) {
    this.articles = dependencies.articles;
    this.categories = dependencies.categories;
    this.users = dependencies.users;
    this.assignSlug = dependencies.assignSlug;
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * @throws ValidationError for a missing title or content, or an unusable category.
   * @throws DatabaseError when no unique slug could be persisted.
   */
  async createArticle(body: unknown, authorId: number): Promise<ArticleRecord> {
    const input = parseBody(articleCreateSchema, body);
    const title = requireTitle(input.title);
    const content = requireContent(input.content);
    const categoryId = input.category_id ?? null;

    if (categoryId !== null) {
      await this.assertActiveCategory(categoryId);
    }

    const publish = resolvePublishTransition(INITIAL_PUBLISH_FIELDS, input.is_published ?? false, this.now());

    return persistWithSlugRetry(
      () => this.assignSlug(title, "article"),
      (slug) =>
        this.articles.createArticle({
          title,
          slug,
          content,
          excerpt: optionalTrimmedText(input.excerpt),
          authorId,
          categoryId,
          isPublished: publish.isPublished,
          publishedAt: publish.publishedAt
        })
    );
  }

  /**
   * Only supplied fields change. A new title re-slugs the article; an
   * `is_published` flip runs the publish transition.
   *
   * @throws BusinessLogicError when the article does not exist.
   * @throws AuthorizationError when the caller is neither the author nor staff.
   * @throws ValidationError for an invalid field or category.
   */
  async updateArticle(id: number, body: unknown, userId: number): Promise<ArticleRecord> {
    const article = await this.requireModifiableArticle(id, userId, "edit");
    const input = parseBody(articleUpdateSchema, body);
    const changes: ArticleChanges = {};

    let retitled: string | undefined;
    if (input.title !== undefined) {
      changes.title = requireTitle(input.title);
      if (changes.title !== article.title) {
        retitled = changes.title;
      }
    }

    if (input.content !== undefined) {
      changes.content = requireContent(input.content);
    }

    if (input.excerpt !== undefined) {
      changes.excerpt = optionalTrimmedText(input.excerpt);
    }

    if (input.category_id !== undefined) {
      if (input.category_id !== null) {
        await this.assertActiveCategory(input.category_id);
      }
      changes.categoryId = input.category_id;
    }

    const publish = resolvePublishTransition(article, input.is_published, this.now());
    if (publish.transition !== "none") {
      changes.isPublished = publish.isPublished;
      changes.publishedAt = publish.publishedAt;
    }

    if (retitled === undefined) {
      return this.requireUpdated(id, changes);
    }

    const newTitle = retitled;
    return persistWithSlugRetry(
      () => this.assignSlug(newTitle, "article", id),
      (slug) => this.requireUpdated(id, { ...changes, slug })
    );
  }

  /** Publishing an already published article keeps its first `publishedAt`. */
  async publishArticle(id: number, userId: number): Promise<ArticleRecord> {
    return this.transition(id, userId, "publish", true);
  }

  async unpublishArticle(id: number, userId: number): Promise<ArticleRecord> {
    return this.transition(id, userId, "unpublish", false);
  }

  async deleteArticle(id: number, userId: number): Promise<void> {
    await this.requireModifiableArticle(id, userId, "delete");
    if (!(await this.articles.deleteArticle(id))) {
      throw new BusinessLogicError("Article not found");
    }
  }

  /** A search term always restricts the listing to published articles. */
  async listArticles(options: ListArticlesOptions): Promise<Paginated<ArticleView>> {
    const page = await this.articles.listArticles({
      publishedOnly: options.publishedOnly || options.search !== undefined,
      skip: options.skip,
      limit: options.limit,
      search: options.search
    });
    return toPaginated(page, options);
  }

  async getPublishedArticleBySlug(slug: string): Promise<ArticleView | null> {
    const article = await this.articles.findViewBySlug(slug);
    return article?.isPublished ? article : null;
  }

  async listArticlesByCategory(categorySlug: string, request: PageRequest): Promise<CategoryArticles | null> {
    const category = await this.categories.findBySlug(categorySlug);
    if (!category?.isActive) {
      return null;
    }

    const page = await this.articles.listArticles({
      publishedOnly: true,
      categoryId: category.id,
      skip: request.skip,
      limit: request.limit
    });

    return { category, articles: toPaginated(page, request) };
  }

  private async transition(
    id: number,
    userId: number,
    action: "publish" | "unpublish",
    requested: boolean
  ): Promise<ArticleRecord> {
    const article = await this.requireModifiableArticle(id, userId, action);
    const resolution = resolvePublishTransition(article, requested, this.now());

    if (resolution.transition === "none") {
      return article;
    }

    return this.requireUpdated(id, {
      isPublished: resolution.isPublished,
      publishedAt: resolution.publishedAt
    });
  }

  private async requireModifiableArticle(id: number, userId: number, action: ArticleAction): Promise<ArticleRecord> {
    const article = await this.articles.findById(id);
    if (!article) {
      throw new BusinessLogicError("Article not found");
    }

    if (article.authorId !== userId) {
      const user = await this.users.findById(userId);
      if (!user?.isStaff) {
        throw new AuthorizationError(`You don't have permission to ${action} this article`, {
          details: { articleId: id, userId }
        });
      }
    }

    return article;
  }

  private async requireUpdated(id: number, changes: ArticleChanges): Promise<ArticleRecord> {
    const updated = await this.articles.updateArticle(id, changes);
    if (!updated) {
      throw new BusinessLogicError("Article not found");
    }
    return updated;
  }

  private async assertActiveCategory(categoryId: number): Promise<void> {
    const category = await this.categories.findById(categoryId);
    if (!category?.isActive) {
      throw new ValidationError("Invalid category selected", { details: { categoryId } });
    }
  }
}
