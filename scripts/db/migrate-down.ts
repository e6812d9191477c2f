import { createDatabasePool } from "../../src/db/connection";
import { migrateDown } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";

const USAGE = "Usage: npm run db:migrate:down -- <positive-integer-steps>";

function parseSteps(rawSteps: string | undefined): number {
  if (rawSteps === undefined) {
    return 1;
  }

  const steps = Number(rawSteps);
  if (!Number.isInteger(steps) || steps < 1) {
    throw new Error(USAGE);
  }

  return steps;
}

async function main() {
  const steps = parseSteps(process.argv[2]);
  const pool = createDatabasePool();

  try {
    const rolledBack = await migrateDown(pool, steps);
    appLogger.info("migrations_rolled_back", { rolledBack, count: rolledBack.length });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.error("migration_rollback_failed", { error, stack: error instanceof Error ? error.stack : undefined });
  process.exitCode = 1;
});
