import { createDatabasePool } from "../../src/db/connection";
import { migrateUp } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";

async function main() {
  const pool = createDatabasePool();
  try {
    const applied = await migrateUp(pool);
    appLogger.info("migrations_applied", { applied, count: applied.length });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.error("migrations_failed", { error, stack: error instanceof Error ? error.stack : undefined });
  process.exitCode = 1;
});
