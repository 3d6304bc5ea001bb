import { Pool } from "pg";
import type { Queryable } from "../services/persistence/pgRepository";
import type { MigrationPool } from "./migrationRunner";

export function createPool(databaseUrl: string): Pool {
  // Managed hosts reached over the public internet require SSL.
  const useSsl = /sslmode=require/.test(databaseUrl);
  return new Pool({
    connectionString: databaseUrl,
    ...(useSsl && { ssl: { rejectUnauthorized: true } })
  });
}

/** Adapt a pool to the repository's query interface. */
export function poolQueryable(pool: Pool): Queryable {
  return {
    query: (text, values) => pool.query(text, values)
  };
}

export function migrationPool(pool: Pool): MigrationPool {
  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release()
      };
    }
  };
}

export async function assertDatabaseConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("SELECT 1");
  } finally {
    client.release();
  }
}
