import type { Pool } from "pg";
import { isForeignKeyViolation, isUniqueViolation } from "../db/transaction";
import type { CategoryRepository } from "./category-repository";
import { DatabaseError, SlugConflictError } from "./errors";
import type { Page, PageRequest } from "./pagination";
import type { SlugNamespace } from "./slug";
import { displayName, type UserRepository } from "./user-repository";

export const ARTICLE_SLUG_CONSTRAINT = "articles_slug_key";

export interface ArticleRecord {
  id: number;
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  isPublished: boolean;
  publishedAt: string | null;
  authorId: number;
  categoryId: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface ArticleView extends ArticleRecord {
  authorName: string;
  categoryName: string | null;
}

export interface CreateArticleInput {
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  authorId: number;
  categoryId: number | null;
  isPublished: boolean;
  publishedAt: string | null;
}

export type ArticleChanges = Partial<
  Pick<CreateArticleInput, "title" | "slug" | "content" | "excerpt" | "categoryId" | "isPublished" | "publishedAt">
>;

export interface ListArticlesInput extends PageRequest {
  publishedOnly: boolean;
  search?: string;
  categoryId?: number;
}

export interface ArticleRepository extends SlugNamespace {
  findById(id: number): Promise<ArticleRecord | null>;
  findViewBySlug(slug: string): Promise<ArticleView | null>;
  listArticles(input: ListArticlesInput): Promise<Page<ArticleView>>;
  createArticle(input: CreateArticleInput): Promise<ArticleRecord>;
  updateArticle(id: number, changes: ArticleChanges): Promise<ArticleRecord | null>;
  deleteArticle(id: number): Promise<boolean>;
}

interface ArticleRow {
  id: number;
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  is_published: boolean;
  published_at: Date | null;
  author_id: number;
  category_id: number | null;
  created_at: Date;
  updated_at: Date;
}

interface ArticleViewRow extends ArticleRow {
  author_username: string;
  author_first_name: string | null;
  author_last_name: string | null;
  category_name: string | null;
}

const ARTICLE_COLUMNS = `
  id,
  title,
  slug,
  content,
  excerpt,
  is_published,
  published_at,
  author_id,
  category_id,
  created_at,
  updated_at
`;

const ARTICLE_VIEW_SELECT = `
  SELECT
    a.id,
    a.title,
    a.slug,
    a.content,
    a.excerpt,
    a.is_published,
    a.published_at,
    a.author_id,
    a.category_id,
    a.created_at,
    a.updated_at,
    u.username AS author_username,
    u.first_name AS author_first_name,
    u.last_name AS author_last_name,
    c.name AS category_name
  FROM articles a
  JOIN users u ON u.id = a.author_id
  LEFT JOIN categories c ON c.id = a.category_id
`;

function toArticleRecord(row: ArticleRow): ArticleRecord {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    content: row.content,
    excerpt: row.excerpt,
    isPublished: row.is_published,
    publishedAt: row.published_at ? row.published_at.toISOString() : null,
    authorId: row.author_id,
    categoryId: row.category_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toArticleView(row: ArticleViewRow): ArticleView {
  return {
    ...toArticleRecord(row),
    authorName: displayName({
      username: row.author_username,
      firstName: row.author_first_name,
      lastName: row.author_last_name
    }),
    categoryName: row.category_name
  };
}

function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function translateWriteError(error: unknown, slug: string | undefined): never {
  if (slug !== undefined && isUniqueViolation(error, ARTICLE_SLUG_CONSTRAINT)) {
    throw new SlugConflictError("article", slug);
  }
  if (isForeignKeyViolation(error)) {
    throw new DatabaseError("Failed to write Article", { details: { reason: "foreign_key_violation" } });
  }
  throw error;
}

export class PostgresArticleRepository implements ArticleRepository {
  constructor(private readonly pool: Pool) {}

  async slugExists(slug: string, excludeId?: number): Promise<boolean> {
    const result = await this.pool.query(
      "SELECT 1 FROM articles WHERE slug = $1 AND ($2::integer IS NULL OR id <> $2) LIMIT 1",
      [slug, excludeId ?? null]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findById(id: number): Promise<ArticleRecord | null> {
    const result = await this.pool.query<ArticleRow>(`SELECT ${ARTICLE_COLUMNS} FROM articles WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toArticleRecord(row) : null;
  }

  async findViewBySlug(slug: string): Promise<ArticleView | null> {
    const result = await this.pool.query<ArticleViewRow>(`${ARTICLE_VIEW_SELECT} WHERE a.slug = $1 LIMIT 1`, [slug]);
    const row = result.rows[0];
    return row ? toArticleView(row) : null;
  }

  async listArticles(input: ListArticlesInput): Promise<Page<ArticleView>> {
    const values: unknown[] = [];
    const where: string[] = [];

    if (input.publishedOnly) {
      where.push("a.is_published");
    }

    if (input.categoryId !== undefined) {
      values.push(input.categoryId);
      where.push(`a.category_id = $${values.length}`);
    }

    if (input.search) {
      values.push(`%${escapeLikePattern(input.search)}%`);
      where.push(`(a.title ILIKE $${values.length} OR a.content ILIKE $${values.length})`);
    }

    const whereClause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    const orderBy = input.publishedOnly ? "a.published_at DESC, a.id DESC" : "a.created_at DESC, a.id DESC";
    const filterValues = [...values];
    values.push(input.limit, input.skip);

    const [itemsResult, countResult] = await Promise.all([
      this.pool.query<ArticleViewRow>(
        `
          ${ARTICLE_VIEW_SELECT}
          ${whereClause}
          ORDER BY ${orderBy}
          LIMIT $${values.length - 1} OFFSET $${values.length}
        `,
        values
      ),
      this.pool.query<{ total: number }>(
        `SELECT count(*)::integer AS total FROM articles a ${whereClause}`,
        filterValues
      )
    ]);

    return {
      items: itemsResult.rows.map(toArticleView),
      total: countResult.rows[0]?.total ?? 0
    };
  }

  async createArticle(input: CreateArticleInput): Promise<ArticleRecord> {
    try {
      const result = await this.pool.query<ArticleRow>(
        `
          INSERT INTO articles (
            title,
            slug,
            content,
            excerpt,
            author_id,
            category_id,
            is_published,
            published_at
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8::timestamptz)
          RETURNING ${ARTICLE_COLUMNS}
        `,
        [
          input.title,
          input.slug,
          input.content,
          input.excerpt,
          input.authorId,
          input.categoryId,
          input.isPublished,
          input.publishedAt
        ]
      );
      return toArticleRecord(result.rows[0]);
    } catch (error) {
      return translateWriteError(error, input.slug);
    }
  }

  async updateArticle(id: number, changes: ArticleChanges): Promise<ArticleRecord | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    const assignments: Array<[string, unknown]> = [
      ["title", changes.title],
      ["slug", changes.slug],
      ["content", changes.content],
      ["excerpt", changes.excerpt],
      ["category_id", changes.categoryId],
      ["is_published", changes.isPublished],
      ["published_at", changes.publishedAt]
    ];

    for (const [column, value] of assignments) {
      if (value === undefined) {
        continue;
      }
      values.push(value);
      updates.push(`${column} = $${values.length}`);
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push("updated_at = now()");
    values.push(id);

    try {
      const result = await this.pool.query<ArticleRow>(
        `
          UPDATE articles
          SET ${updates.join(", ")}
          WHERE id = $${values.length}
          RETURNING ${ARTICLE_COLUMNS}
        `,
        values
      );
      const row = result.rows[0];
      return row ? toArticleRecord(row) : null;
    } catch (error) {
      return translateWriteError(error, changes.slug);
    }
  }

  async deleteArticle(id: number): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM articles WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export interface InMemoryArticleLookups {
  users: Pick<UserRepository, "findById">;
  categories: Pick<CategoryRepository, "findById">;
}

export type InMemoryArticleSeed = Omit<
  ArticleRecord,
  "createdAt" | "updatedAt" | "excerpt" | "categoryId" | "isPublished" | "publishedAt"
> &
  Partial<Pick<ArticleRecord, "createdAt" | "updatedAt" | "excerpt" | "categoryId" | "isPublished" | "publishedAt">>;

function compareDescending(left: string | null, right: string | null): number {
  return (right ?? "").localeCompare(left ?? "");
}

export class InMemoryArticleRepository implements ArticleRepository {
  private articles: ArticleRecord[];
  private nextId: number;

  constructor(
    private readonly lookups: InMemoryArticleLookups,
    initialArticles: InMemoryArticleSeed[] = []
  ) {
    const now = new Date().toISOString();
    this.articles = initialArticles.map((article) => ({
      ...article,
      excerpt: article.excerpt ?? null,
      categoryId: article.categoryId ?? null,
      isPublished: article.isPublished ?? false,
      publishedAt: article.publishedAt ?? null,
      createdAt: article.createdAt ?? now,
      updatedAt: article.updatedAt ?? now
    }));
    this.nextId = Math.max(0, ...this.articles.map((article) => article.id)) + 1;
  }

  async slugExists(slug: string, excludeId?: number): Promise<boolean> {
    return this.articles.some((article) => article.slug === slug && article.id !== excludeId);
  }

  async findById(id: number): Promise<ArticleRecord | null> {
    const article = this.articles.find((candidate) => candidate.id === id);
    return article ? { ...article } : null;
  }

  async findViewBySlug(slug: string): Promise<ArticleView | null> {
    const article = this.articles.find((candidate) => candidate.slug === slug);
    return article ? this.toView(article) : null;
  }

  async listArticles(input: ListArticlesInput): Promise<Page<ArticleView>> {
    const search = input.search?.toLowerCase();
    const matching = this.articles
      .filter((article) => !input.publishedOnly || article.isPublished)
      .filter((article) => input.categoryId === undefined || article.categoryId === input.categoryId)
      .filter(
        (article) =>
          !search || article.title.toLowerCase().includes(search) || article.content.toLowerCase().includes(search)
      )
      .sort((left, right) =>
        input.publishedOnly
          ? compareDescending(left.publishedAt, right.publishedAt) || right.id - left.id
          : compareDescending(left.createdAt, right.createdAt) || right.id - left.id
      );

    const page = matching.slice(input.skip, input.skip + input.limit);
    return {
      items: await Promise.all(page.map((article) => this.toView(article))),
      total: matching.length
    };
  }

  async createArticle(input: CreateArticleInput): Promise<ArticleRecord> {
    if (this.articles.some((candidate) => candidate.slug === input.slug)) {
      throw new SlugConflictError("article", input.slug);
    }

    const createdAt = new Date().toISOString();
    const article: ArticleRecord = {
      id: this.nextId++,
      ...input,
      createdAt,
      updatedAt: createdAt
    };

    this.articles.push(article);
    return { ...article };
  }

  async updateArticle(id: number, changes: ArticleChanges): Promise<ArticleRecord | null> {
    const index = this.articles.findIndex((article) => article.id === id);
    if (index === -1) {
      return null;
    }

    const slug = changes.slug;
    if (slug !== undefined && this.articles.some((candidate) => candidate.id !== id && candidate.slug === slug)) {
      throw new SlugConflictError("article", slug);
    }

    const existing = this.articles[index];
    const updated: ArticleRecord = {
      ...existing,
      title: changes.title ?? existing.title,
      slug: slug ?? existing.slug,
      content: changes.content ?? existing.content,
      excerpt: changes.excerpt === undefined ? existing.excerpt : changes.excerpt,
      categoryId: changes.categoryId === undefined ? existing.categoryId : changes.categoryId,
      isPublished: changes.isPublished ?? existing.isPublished,
      publishedAt: changes.publishedAt === undefined ? existing.publishedAt : changes.publishedAt,
      updatedAt: new Date().toISOString()
    };

    this.articles[index] = updated;
    return { ...updated };
  }

  async deleteArticle(id: number): Promise<boolean> {
    const before = this.articles.length;
    this.articles = this.articles.filter((article) => article.id !== id);
    return this.articles.length < before;
  }

  private async toView(article: ArticleRecord): Promise<ArticleView> {
    const [author, category] = await Promise.all([
      this.lookups.users.findById(article.authorId),
      article.categoryId === null ? Promise.resolve(null) : this.lookups.categories.findById(article.categoryId)
    ]);

    return {
      ...article,
      authorName: author ? displayName(author) : "",
      categoryName: category?.name ?? null
    };
  }
}
