import type { Pool, PoolClient } from "pg";

export async function withTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

interface PgErrorLike {
  code?: unknown;
  constraint?: unknown;
}

function isPgErrorLike(error: unknown): error is PgErrorLike {
  return typeof error === "object" && error !== null && "code" in error;
}

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!isPgErrorLike(error) || error.code !== "23505") {
    return false;
  }

  return constraint === undefined || error.constraint === constraint;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return isPgErrorLike(error) && error.code === "23503";
}
