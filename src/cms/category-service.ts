import type { CategoryChanges, CategoryRecord, CategoryRepository } from "./category-repository";
import { BusinessLogicError } from "./errors";
import { toPaginated, type PageRequest, type Paginated } from "./pagination";
import { persistWithSlugRetry, type AssignSlug } from "./slug";
import {
  CATEGORY_NAME_MAX_LENGTH,
  categoryCreateSchema,
  categoryUpdateSchema,
  optionalTrimmedText,
  parseBody,
  requireTrimmedText
} from "./validation";

export interface CategoryServiceDependencies {
  categories: CategoryRepository;
  assignSlug: AssignSlug;
}

export interface ListCategoriesOptions extends PageRequest {
  activeOnly: boolean;
}

function requireName(name: string): string {
  return requireTrimmedText(
    name,
    "Category name is required",
    CATEGORY_NAME_MAX_LENGTH,
    `Category name must be ${CATEGORY_NAME_MAX_LENGTH} characters or less`
  );
}

export class CategoryService {
  private readonly categories: CategoryRepository;
  private readonly assignSlug: AssignSlug;

  constructor(dependencies: CategoryServiceDependencies) {
    this.categories = dependencies.categories;
    this.assignSlug = dependencies.assignSlug;
  }

  /**
   * @throws ValidationError for a missing or overlong name.
   * @throws DatabaseError when no unique slug could be persisted.
   */
  async createCategory(body: unknown): Promise<CategoryRecord> {
    const input = parseBody(categoryCreateSchema, body);
    const name = requireName(input.name);

    return persistWithSlugRetry(
      () => this.assignSlug(name, "category"),
      (slug) =>
        this.categories.createCategory({
          name,
          slug,
          description: optionalTrimmedText(input.description),
          isActive: input.is_active ?? true
        })
    );
  }

  /**
   * @throws BusinessLogicError when the category does not exist.
   * @throws ValidationError for an invalid field.
   */
  async updateCategory(id: number, body: unknown): Promise<CategoryRecord> {
    const category = await this.categories.findById(id);
    if (!category) {
      throw new BusinessLogicError("Category not found");
    }

    const input = parseBody(categoryUpdateSchema, body);
    const changes: CategoryChanges = {};

    if (input.description !== undefined) {
      changes.description = optionalTrimmedText(input.description);
    }
    if (input.is_active !== undefined) {
      changes.isActive = input.is_active;
    }

    const name = input.name === undefined ? undefined : requireName(input.name);
    if (name === undefined || name === category.name) {
      return this.requireUpdated(id, name === undefined ? changes : { ...changes, name });
    }

    return persistWithSlugRetry(
      () => this.assignSlug(name, "category", id),
      (slug) => this.requireUpdated(id, { ...changes, name, slug })
    );
  }

  async listCategories(options: ListCategoriesOptions): Promise<Paginated<CategoryRecord>> {
    const page = await this.categories.listCategories(options);
    return toPaginated(page, options);
  }

  async getActiveCategoryBySlug(slug: string): Promise<CategoryRecord | null> {
    const category = await this.categories.findBySlug(slug);
    return category?.isActive ? category : null;
  }

  private async requireUpdated(id: number, changes: CategoryChanges): Promise<CategoryRecord> {
    const updated = await this.categories.updateCategory(id, changes);
    if (!updated) {
      throw new BusinessLogicError("Category not found");
    }
    return updated;
  }
}
