import { PostgresArticleRepository } from "../../src/cms/article-repository";
import { ArticleService } from "../../src/cms/article-service";
import { PostgresCategoryRepository } from "../../src/cms/category-repository";
import { CategoryService } from "../../src/cms/category-service";
import { createSlugAssigner, normalizeSlug } from "../../src/cms/slug";
import { PostgresUserRepository } from "../../src/cms/user-repository";
import { loadConfig } from "../../src/config";
import { createDatabasePool } from "../../src/db/connection";
import { migrateUp } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";
import { createBcryptPasswordHasher } from "../../src/security/password";

const DEV_STAFF = {
  email: "editor@example.com",
  username: "dev_editor",
  firstName: "Dev",
  lastName: "Editor"
};

const DEV_CATEGORIES = [
  { name: "Announcements", description: "Product and team news" },
  { name: "Guides", description: "Step-by-step walkthroughs" }
];

// Seeding is repeatable: rows whose base slug already exists are left alone.
const DEV_ARTICLES = [
  {
    title: "Welcome to the newsroom",
    content: "<p>This article was created by the development seed.</p>",
    excerpt: "A first published article.",
    category: "Announcements",
    isPublished: true
  },
  {
    title: "Draft: writing your first guide",
    content: "<p>Outline the steps, then add screenshots.</p>",
    category: "Guides",
    isPublished: false
  }
];

async function main() {
  if (process.env.NODE_ENV === "production") {
    throw new Error("seed-dev must not run in production");
  }

  const config = loadConfig();
  const pool = createDatabasePool();

  try {
    await migrateUp(pool);

    const users = new PostgresUserRepository(pool);
    const categories = new PostgresCategoryRepository(pool);
    const articles = new PostgresArticleRepository(pool);
    const assignSlug = createSlugAssigner({ article: articles, category: categories });
    const categoryService = new CategoryService({ categories, assignSlug });
    const articleService = new ArticleService({ articles, categories, users, assignSlug });

    const password = process.env.SEED_STAFF_PASSWORD ?? "Dev-Password1!";
    const existing = await users.findByEmail(DEV_STAFF.email);
    const staff =
      existing ??
      (await users.createUser({
        ...DEV_STAFF,
        passwordHash: await createBcryptPasswordHasher(config.passwordHashRounds).hash(password)
      }));
    await pool.query("UPDATE users SET is_staff = true, updated_at = now() WHERE id = $1", [staff.id]);

    const categoryIds = new Map<string, number>();
    for (const seed of DEV_CATEGORIES) {
      const category =
        (await categories.findBySlug(normalizeSlug(seed.name))) ??
        (await categoryService.createCategory({ name: seed.name, description: seed.description }));
      categoryIds.set(seed.name, category.id);
    }

    for (const seed of DEV_ARTICLES) {
      if (await articles.slugExists(normalizeSlug(seed.title))) {
        continue;
      }

      await articleService.createArticle(
        {
          title: seed.title,
          content: seed.content,
          excerpt: seed.excerpt,
          category_id: categoryIds.get(seed.category) ?? null,
          is_published: seed.isPublished
        },
        staff.id
      );
    }

    appLogger.info("dev_seed_completed", {
      staffUserId: staff.id,
      categories: DEV_CATEGORIES.length,
      articles: DEV_ARTICLES.length
    });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.error("dev_seed_failed", { error, stack: error instanceof Error ? error.stack : undefined });
  process.exitCode = 1;
});
