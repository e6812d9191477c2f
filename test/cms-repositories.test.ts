import { describe, expect, it } from "vitest";
import { InMemoryArticleRepository } from "../src/cms/article-repository";
import { InMemoryCategoryRepository } from "../src/cms/category-repository";
import { CategoryService } from "../src/cms/category-service";
import { DatabaseError, SlugConflictError } from "../src/cms/errors";
import { createSlugAssigner } from "../src/cms/slug";
import { InMemoryUserRepository } from "../src/cms/user-repository";
import { AUTHOR, STAFF } from "./helpers";

function createRepositories() {
  const users = new InMemoryUserRepository([AUTHOR, STAFF]);
  const categories = new InMemoryCategoryRepository([{ id: 1, name: "Science", slug: "science" }]);
  const articles = new InMemoryArticleRepository({ users, categories }, [
    {
      id: 1,
      title: "100% Done_ish",
      slug: "100-done-ish",
      content: "<p>Progress report</p>",
      authorId: STAFF.id,
      categoryId: 1,
      isPublished: true,
      publishedAt: "2026-01-01T00:00:00.000Z"
    }
  ]);
  return { users, categories, articles };
}

describe("InMemoryArticleRepository", () => {
  it("rejects a duplicate slug with a slug conflict", async () => {
    const { articles } = createRepositories();

    const attempt = articles.createArticle({
      title: "Again",
      slug: "100-done-ish",
      content: "<p>x</p>",
      excerpt: null,
      authorId: AUTHOR.id,
      categoryId: null,
      isPublished: false,
      publishedAt: null
    });

    await expect(attempt).rejects.toBeInstanceOf(SlugConflictError);
    await expect(attempt).rejects.toBeInstanceOf(DatabaseError);
  });

  it("excludes the row being updated from slug existence checks", async () => {
    const { articles } = createRepositories();

    expect(await articles.slugExists("100-done-ish")).toBe(true);
    expect(await articles.slugExists("100-done-ish", 1)).toBe(false);
  });

  it("treats search wildcards as literal text", async () => {
    const { articles } = createRepositories();

    const literal = await articles.listArticles({ publishedOnly: true, search: "100%", skip: 0, limit: 10 });
    const underscore = await articles.listArticles({ publishedOnly: true, search: "d_ne", skip: 0, limit: 10 });

    expect(literal.total).toBe(1);
    expect(underscore.total).toBe(0);
  });

  it("joins author and category names into views", async () => {
    const { articles } = createRepositories();

    const view = await articles.findViewBySlug("100-done-ish");

    expect(view).toMatchObject({ authorName: "Eve", categoryName: "Science" });
  });

  it("reports whether a delete removed anything", async () => {
    const { articles } = createRepositories();

    expect(await articles.deleteArticle(1)).toBe(true);
    expect(await articles.deleteArticle(1)).toBe(false);
  });
});

describe("InMemoryUserRepository", () => {
  it("matches email case-insensitively", async () => {
    const { users } = createRepositories();

    expect(await users.emailExists("AUTHOR@EXAMPLE.COM")).toBe(true);
    expect((await users.findByEmail("Author@Example.com"))?.id).toBe(AUTHOR.id);
  });
});

describe("concurrent slug assignment", () => {
  it("gives two simultaneous categories with the same name distinct slugs", async () => {
    const categories = new InMemoryCategoryRepository();
    const articles = new InMemoryArticleRepository({ users: new InMemoryUserRepository(), categories });
    const service = new CategoryService({
      categories,
      assignSlug: createSlugAssigner({ article: articles, category: categories })
    });

    const created = await Promise.all([
      service.createCategory({ name: "Science" }),
      service.createCategory({ name: "Science" })
    ]);

    expect(created.map((category) => category.slug).sort()).toEqual(["science", "science-1"]);
  });
});
