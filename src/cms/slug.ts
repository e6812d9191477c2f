import { randomBytes } from "node:crypto";
import { DatabaseError, SlugConflictError } from "./errors";

export type SluggableEntityType = "article" | "category";

export const SLUG_MAX_LENGTH = 100;
export const MAX_NUMERIC_SUFFIX = 1000;
export const MAX_PERSIST_ATTEMPTS = 5;

export interface SlugNamespace {
  slugExists(slug: string, excludeId?: number): Promise<boolean>;
}

export type SlugNamespaces = Record<SluggableEntityType, SlugNamespace>;

export type AssignSlug = (candidateText: string, entityType: SluggableEntityType, excludeId?: number) => Promise<string>;

export function normalizeSlug(candidateText: string): string {
  return candidateText
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/[\s-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, SLUG_MAX_LENGTH);
}

function withSuffix(base: string, suffix: string): string {
  const room = SLUG_MAX_LENGTH - suffix.length;
  const head = base.length > room ? base.slice(0, room).replace(/-+$/, "") : base;
  return `${head}${suffix}`;
}

/**
 * Numeric suffixes are probed in order up to MAX_NUMERIC_SUFFIX; past that a
 * single random suffix is tried before giving up.
 */
export function createSlugAssigner(namespaces: SlugNamespaces): AssignSlug {
  return async (candidateText, entityType, excludeId) => {
    const namespace = namespaces[entityType];
    const base = normalizeSlug(candidateText) || entityType;

    if (!(await namespace.slugExists(base, excludeId))) {
      return base;
    }

    for (let counter = 1; counter <= MAX_NUMERIC_SUFFIX; counter += 1) {
      const candidate = withSuffix(base, `-${counter}`);
      if (!(await namespace.slugExists(candidate, excludeId))) {
        return candidate;
      }
    }

    const randomCandidate = withSuffix(base, `-${randomBytes(4).toString("hex")}`);
    if (!(await namespace.slugExists(randomCandidate, excludeId))) {
      return randomCandidate;
    }

    throw new DatabaseError("unable to generate unique slug", {
      details: { entityType, base }
    });
  };
}

/**
 * Runs assign-then-persist, treating a slug unique violation from the store as
 * a lost race: the slug is assigned again and the write retried.
 */
export async function persistWithSlugRetry<T>(
  assign: () => Promise<string>,
  persist: (slug: string) => Promise<T>,
  maxAttempts = MAX_PERSIST_ATTEMPTS
): Promise<T> {
  let lastConflict: SlugConflictError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const slug = await assign();
    try {
      return await persist(slug);
    } catch (error) {
      if (!(error instanceof SlugConflictError)) {
        throw error;
      }
      lastConflict = error;
    }
  }

  throw new DatabaseError("slug assignment retries exhausted", {
    details: { attempts: maxAttempts, lastSlug: lastConflict?.slug }
  });
}
