import type { Pool } from "pg";
import { isUniqueViolation } from "../db/transaction";
import { SlugConflictError } from "./errors";
import type { Page, PageRequest } from "./pagination";
import type { SlugNamespace } from "./slug";

export const CATEGORY_SLUG_CONSTRAINT = "categories_slug_key";

export interface CategoryRecord {
  id: number;
  name: string;
  slug: string;
  description: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CreateCategoryInput {
  name: string;
  slug: string;
  description: string | null;
  isActive: boolean;
}

export type CategoryChanges = Partial<CreateCategoryInput>;

export interface ListCategoriesInput extends PageRequest {
  activeOnly: boolean;
}

export interface CategoryRepository extends SlugNamespace {
  findById(id: number): Promise<CategoryRecord | null>;
  findBySlug(slug: string): Promise<CategoryRecord | null>;
  listCategories(input: ListCategoriesInput): Promise<Page<CategoryRecord>>;
  createCategory(input: CreateCategoryInput): Promise<CategoryRecord>;
  updateCategory(id: number, changes: CategoryChanges): Promise<CategoryRecord | null>;
}

interface CategoryRow {
  id: number;
  name: string;
  slug: string;
  description: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

const CATEGORY_COLUMNS = "id, name, slug, description, is_active, created_at, updated_at";

function toCategoryRecord(row: CategoryRow): CategoryRecord {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function rethrowSlugConflict(error: unknown, slug: string | undefined): never {
  if (slug !== undefined && isUniqueViolation(error, CATEGORY_SLUG_CONSTRAINT)) {
    throw new SlugConflictError("category", slug);
  }
  throw error;
}

export class PostgresCategoryRepository implements CategoryRepository {
  constructor(private readonly pool: Pool) {}

  async slugExists(slug: string, excludeId?: number): Promise<boolean> {
    const result = await this.pool.query(
      "SELECT 1 FROM categories WHERE slug = $1 AND ($2::integer IS NULL OR id <> $2) LIMIT 1",
      [slug, excludeId ?? null]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findById(id: number): Promise<CategoryRecord | null> {
    const result = await this.pool.query<CategoryRow>(`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toCategoryRecord(row) : null;
  }

  async findBySlug(slug: string): Promise<CategoryRecord | null> {
    const result = await this.pool.query<CategoryRow>(`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE slug = $1`, [
      slug
    ]);
    const row = result.rows[0];
    return row ? toCategoryRecord(row) : null;
  }

  async listCategories(input: ListCategoriesInput): Promise<Page<CategoryRecord>> {
    const where = input.activeOnly ? "WHERE is_active" : "";
    const [itemsResult, countResult] = await Promise.all([
      this.pool.query<CategoryRow>(
        `
          SELECT ${CATEGORY_COLUMNS}
          FROM categories
          ${where}
          ORDER BY name ASC, id ASC
          LIMIT $1 OFFSET $2
        `,
        [input.limit, input.skip]
      ),
      this.pool.query<{ total: number }>(`SELECT count(*)::integer AS total FROM categories ${where}`)
    ]);

    return {
      items: itemsResult.rows.map(toCategoryRecord),
      total: countResult.rows[0]?.total ?? 0
    };
  }

  async createCategory(input: CreateCategoryInput): Promise<CategoryRecord> {
    try {
      const result = await this.pool.query<CategoryRow>(
        `
          INSERT INTO categories (name, slug, description, is_active)
          VALUES ($1, $2, $3, $4)
          RETURNING ${CATEGORY_COLUMNS}
        `,
        [input.name, input.slug, input.description, input.isActive]
      );
      return toCategoryRecord(result.rows[0]);
    } catch (error) {
      return rethrowSlugConflict(error, input.slug);
    }
  }

  async updateCategory(id: number, changes: CategoryChanges): Promise<CategoryRecord | null> {
    const updates: string[] = [];
    const values: unknown[] = [];

    const assignments: Array<[string, unknown]> = [
      ["name", changes.name],
      ["slug", changes.slug],
      ["description", changes.description],
      ["is_active", changes.isActive]
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
      const result = await this.pool.query<CategoryRow>(
        `
          UPDATE categories
          SET ${updates.join(", ")}
          WHERE id = $${values.length}
          RETURNING ${CATEGORY_COLUMNS}
        `,
        values
      );
      const row = result.rows[0];
      return row ? toCategoryRecord(row) : null;
    } catch (error) {
      return rethrowSlugConflict(error, changes.slug);
    }
  }
}

export type InMemoryCategorySeed = Omit<CategoryRecord, "createdAt" | "updatedAt" | "description" | "isActive"> &
  Partial<Pick<CategoryRecord, "createdAt" | "updatedAt" | "description" | "isActive">>;

export class InMemoryCategoryRepository implements CategoryRepository {
  private categories: CategoryRecord[];
  private nextId: number;

  constructor(initialCategories: InMemoryCategorySeed[] = []) {
    const now = new Date().toISOString();
    this.categories = initialCategories.map((category) => ({
      ...category,
      description: category.description ?? null,
      isActive: category.isActive ?? true,
      createdAt: category.createdAt ?? now,
      updatedAt: category.updatedAt ?? now
    }));
    this.nextId = Math.max(0, ...this.categories.map((category) => category.id)) + 1;
  }

  async slugExists(slug: string, excludeId?: number): Promise<boolean> {
    return this.categories.some((category) => category.slug === slug && category.id !== excludeId);
  }

  async findById(id: number): Promise<CategoryRecord | null> {
    const category = this.categories.find((candidate) => candidate.id === id);
    return category ? { ...category } : null;
  }

  async findBySlug(slug: string): Promise<CategoryRecord | null> {
    const category = this.categories.find((candidate) => candidate.slug === slug);
    return category ? { ...category } : null;
  }

  async listCategories(input: ListCategoriesInput): Promise<Page<CategoryRecord>> {
    const matching = this.categories
      .filter((category) => !input.activeOnly || category.isActive)
      .sort((left, right) => left.name.localeCompare(right.name) || left.id - right.id);

    return {
      items: matching.slice(input.skip, input.skip + input.limit).map((category) => ({ ...category })),
      total: matching.length
    };
  }

  async createCategory(input: CreateCategoryInput): Promise<CategoryRecord> {
    if (this.categories.some((candidate) => candidate.slug === input.slug)) {
      throw new SlugConflictError("category", input.slug);
    }

    const createdAt = new Date().toISOString();
    const category: CategoryRecord = {
      id: this.nextId++,
      ...input,
      createdAt,
      updatedAt: createdAt
    };

    this.categories.push(category);
    return { ...category };
  }

  async updateCategory(id: number, changes: CategoryChanges): Promise<CategoryRecord | null> {
    const index = this.categories.findIndex((category) => category.id === id);
    if (index === -1) {
      return null;
    }

    const slug = changes.slug;
    if (slug !== undefined && this.categories.some((candidate) => candidate.id !== id && candidate.slug === slug)) {
      throw new SlugConflictError("category", slug);
    }

    const existing = this.categories[index];
    const updated: CategoryRecord = {
      ...existing,
      name: changes.name ?? existing.name,
      slug: slug ?? existing.slug,
      description: changes.description === undefined ? existing.description : changes.description,
      isActive: changes.isActive ?? existing.isActive,
      updatedAt: new Date().toISOString()
    };

    this.categories[index] = updated;
    return { ...updated };
  }
}
