import fs from "node:fs/promises";
import path from "node:path";

const MIGRATIONS_DIR = path.resolve(process.cwd(), "migrations");

/** The part of a pg PoolClient the runner uses. */
export type MigrationClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
};

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

async function ensureMigrationTable(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id BIGSERIAL PRIMARY KEY,
      filename TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

function filenameOf(row: unknown): string | null {
  if (typeof row !== "object" || row === null || !("filename" in row)) return null;
  return typeof row.filename === "string" ? row.filename : null;
}

/** Apply every .sql file in the directory not yet recorded, in filename order, in one transaction. */
export async function runMigrations(pool: MigrationPool, migrationsDir = MIGRATIONS_DIR): Promise<string[]> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await ensureMigrationTable(client);

    const files = (await fs.readdir(migrationsDir)).filter((name) => name.endsWith(".sql")).sort();
    const applied = await client.query("SELECT filename FROM schema_migrations");
    const appliedSet = new Set(applied.rows.map(filenameOf));

    const newlyApplied: string[] = [];
    for (const file of files) {
      if (appliedSet.has(file)) continue;
      await client.query(await fs.readFile(path.join(migrationsDir, file), "utf8"));
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [file]);
      newlyApplied.push(file);
    }

    await client.query("COMMIT");
    return newlyApplied;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
