import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadMigrations } from "../src/db/migrations";

const migrationsDirectory = path.resolve(process.cwd(), "db/migrations");
const upSql = readFileSync(path.join(migrationsDirectory, "0001_cms_schema.up.sql"), "utf8");
const downSql = readFileSync(path.join(migrationsDirectory, "0001_cms_schema.down.sql"), "utf8");

describe("DB migration 0001_cms_schema", () => {
  it("creates the users, categories and articles tables", () => {
    expect(upSql).toContain("CREATE TABLE IF NOT EXISTS users");
    expect(upSql).toContain("CREATE TABLE IF NOT EXISTS categories");
    expect(upSql).toContain("CREATE TABLE IF NOT EXISTS articles");
  });

  it("backs slug uniqueness with the constraints the repositories translate", () => {
    expect(upSql).toContain("CONSTRAINT categories_slug_key UNIQUE (slug)");
    expect(upSql).toContain("CONSTRAINT articles_slug_key UNIQUE (slug)");
    expect(upSql).toContain("CONSTRAINT users_email_key UNIQUE (email)");
    expect(upSql).toContain("CONSTRAINT users_username_key UNIQUE (username)");
  });

  it("ties published_at to the publish flag", () => {
    expect(upSql).toContain("CONSTRAINT articles_published_at_matches_state CHECK");
  });

  it("adds the listing indexes", () => {
    expect(upSql).toContain("idx_articles_published_at_desc");
    expect(upSql).toContain("idx_articles_created_at_desc");
    expect(upSql).toContain("idx_articles_category_id_published_at_desc");
  });

  it("drops tables in dependency order on rollback", () => {
    expect(downSql.indexOf("DROP TABLE IF EXISTS articles")).toBeLessThan(
      downSql.indexOf("DROP TABLE IF EXISTS categories")
    );
    expect(downSql.indexOf("DROP TABLE IF EXISTS categories")).toBeLessThan(
      downSql.indexOf("DROP TABLE IF EXISTS users")
    );
  });
});

describe("loadMigrations", () => {
  it("pairs every up migration with its down migration", async () => {
    await expect(loadMigrations(migrationsDirectory)).resolves.toEqual([
      {
        name: "0001_cms_schema",
        upPath: path.join(migrationsDirectory, "0001_cms_schema.up.sql"),
        downPath: path.join(migrationsDirectory, "0001_cms_schema.down.sql")
      }
    ]);
  });
});
