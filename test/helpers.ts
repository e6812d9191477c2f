import request from "supertest";
import { createApp, type AppDependencies } from "../src/app";
import { InMemoryArticleRepository, type InMemoryArticleSeed } from "../src/cms/article-repository";
import { InMemoryCategoryRepository, type InMemoryCategorySeed } from "../src/cms/category-repository";
import { ErrorManager } from "../src/cms/error-manager";
import { InMemoryUserRepository, type InMemoryUserSeed } from "../src/cms/user-repository";
import type { AppConfig } from "../src/config";
import type { LogLevel, LogMetadata, Logger } from "../src/security/logger";
import type { PasswordHasher } from "../src/security/password";

export const csrfToken = "csrf-token-123456";

export interface RecordedLogEntry {
  level: LogLevel;
  event: string;
  metadata: LogMetadata;
}

export function createRecordingLogger(): Logger & { entries: RecordedLogEntry[] } {
  const entries: RecordedLogEntry[] = [];
  return {
    entries,
    info: (event, metadata = {}) => entries.push({ level: "info", event, metadata }),
    warn: (event, metadata = {}) => entries.push({ level: "warn", event, metadata }),
    error: (event, metadata = {}) => entries.push({ level: "error", event, metadata })
  };
}

/** Deterministic stand-in so route tests do not pay for bcrypt rounds. */
export const plainTextHasher: PasswordHasher = {
  hash: async (plaintext) => `hashed:${plaintext}`,
  verify: async (plaintext, digest) => digest === `hashed:${plaintext}`
};

export function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 3000,
    passwordHashRounds: 4,
    rateLimit: { enabled: false },
    securityHeaders: {
      isProduction: false,
      cspFrameAncestors: ["'none'"],
      cspConnectSrc: ["'self'"]
    },
    ...overrides
  };
}

export const AUTHOR: InMemoryUserSeed = {
  id: 1,
  email: "author@example.com",
  username: "author_one",
  passwordHash: "hashed:Author-Pass1!",
  firstName: "Ada",
  lastName: "Writer",
  isActive: true,
  isStaff: false,
  isSuperuser: false
};

export const OTHER_USER: InMemoryUserSeed = {
  id: 2,
  email: "reader@example.com",
  username: "reader_two",
  passwordHash: "hashed:Reader-Pass1!",
  isActive: true,
  isStaff: false,
  isSuperuser: false
};

export const STAFF: InMemoryUserSeed = {
  id: 3,
  email: "editor@example.com",
  username: "editor_three",
  passwordHash: "hashed:Editor-Pass1!",
  firstName: "Eve",
  isActive: true,
  isStaff: true,
  isSuperuser: false
};

export const INACTIVE_USER: InMemoryUserSeed = {
  id: 4,
  email: "gone@example.com",
  username: "gone_four",
  passwordHash: "hashed:Gone-Pass1!",
  isActive: false,
  isStaff: false,
  isSuperuser: false
};

export interface TestAppSeed {
  users?: InMemoryUserSeed[];
  categories?: InMemoryCategorySeed[];
  articles?: InMemoryArticleSeed[];
  now?: () => Date;
  config?: Partial<AppConfig>;
  dependencies?: Partial<AppDependencies>;
}

export function createTestApp(seed: TestAppSeed = {}) {
  const logger = createRecordingLogger();
  const users = new InMemoryUserRepository(seed.users ?? [AUTHOR, OTHER_USER, STAFF, INACTIVE_USER]);
  const categories = new InMemoryCategoryRepository(seed.categories ?? []);
  const articles = new InMemoryArticleRepository({ users, categories }, seed.articles ?? []);
  const errorManager = new ErrorManager(logger, { now: seed.now });

  const app = createApp(createConfig(seed.config), {
    logger,
    errorManager,
    userRepository: users,
    categoryRepository: categories,
    articleRepository: articles,
    passwordHasher: plainTextHasher,
    now: seed.now,
    ...seed.dependencies
  });

  return { app, logger, users, categories, articles };
}

export function asUser(req: request.Test, userId: number, options: { csrf?: boolean } = {}) {
  const withUser = req.set("x-user-id", String(userId));
  return options.csrf === false ? withUser : withUser.set("x-csrf-token", csrfToken);
}
