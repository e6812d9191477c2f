import { createApp } from "./app";
import { PostgresArticleRepository } from "./cms/article-repository";
import { PostgresCategoryRepository } from "./cms/category-repository";
import { PostgresUserRepository } from "./cms/user-repository";
import { loadConfig } from "./config";
import { createDatabasePool } from "./db/connection";
import { appLogger } from "./security/logger";

const config = loadConfig();
const databasePool = createDatabasePool();
const app = createApp(config, {
  logger: appLogger,
  userRepository: new PostgresUserRepository(databasePool),
  categoryRepository: new PostgresCategoryRepository(databasePool),
  articleRepository: new PostgresArticleRepository(databasePool),
  healthCheck: async () => {
    await databasePool.query("SELECT 1");
  }
});

app.listen(config.port, () => {
  appLogger.info("server_listening", { port: config.port });
});

async function shutdown(): Promise<void> {
  await databasePool.end();
}

function handleSignal(signal: NodeJS.Signals): void {
  shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      appLogger.error("shutdown_failed", { signal, error });
      process.exit(1);
    });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);
