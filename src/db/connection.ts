import { Pool, type PoolConfig } from "pg";

const DEFAULT_POOL_MAX = 10;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }

  return defaultValue;
}

function parsePoolMax(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_POOL_MAX;
}

export function buildDatabaseConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  const sslEnabled = parseBoolean(env.DATABASE_SSL, false);
  const rejectUnauthorized = parseBoolean(env.DATABASE_SSL_REJECT_UNAUTHORIZED, true);

  return {
    connectionString,
    application_name: "slugpress-cms",
    max: parsePoolMax(env.DATABASE_POOL_MAX),
    ssl: sslEnabled ? { rejectUnauthorized } : undefined
  };
}

export function createDatabasePool(env: NodeJS.ProcessEnv = process.env): Pool {
  return new Pool(buildDatabaseConfig(env));
}
