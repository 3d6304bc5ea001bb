import fs from "node:fs";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { runMigrations, type MigrationClient, type MigrationPool } from "../src/db/migrationRunner";

class FakeMigrationClient implements MigrationClient {
  readonly statements: string[] = [];
  released = false;

  constructor(
    private readonly appliedFiles: string[],
    private readonly failOn?: string
  ) {}

  async query(text: string): Promise<{ rows: unknown[] }> {
    this.statements.push(text.trim().split("\n")[0]);
    if (this.failOn && text.includes(this.failOn)) throw new Error("syntax error");
    if (text.startsWith("SELECT filename")) {
      return { rows: this.appliedFiles.map((filename) => ({ filename })) };
    }
    return { rows: [] };
  }

  release(): void {
    this.released = true;
  }
}

function poolFor(client: FakeMigrationClient): MigrationPool {
  return { connect: async () => client };
}

const MIGRATION = "001_interview_engine.sql";

describe("runMigrations", () => {
  test("the schema migration creates the engine tables", () => {
    const sql = fs.readFileSync(path.resolve(process.cwd(), "migrations", MIGRATION), "utf8");
    for (const table of ["interview_sessions", "interview_turns", "interview_reports"]) {
      expect(sql).toContain(`CREATE TABLE IF NOT EXISTS ${table}`);
    }
  });

  test("applies new files in one transaction", async () => {
    const client = new FakeMigrationClient([]);

    expect(await runMigrations(poolFor(client))).toEqual([MIGRATION]);

    expect(client.statements[0]).toBe("BEGIN");
    expect(client.statements[1]).toBe("CREATE TABLE IF NOT EXISTS schema_migrations (");
    expect(client.statements[2]).toBe("SELECT filename FROM schema_migrations");
    expect(client.statements[3]).toBe("CREATE TABLE IF NOT EXISTS interview_sessions (");
    expect(client.statements.slice(4)).toEqual(["INSERT INTO schema_migrations (filename) VALUES ($1)", "COMMIT"]);
    expect(client.released).toBe(true);
  });

  test("skips files already recorded", async () => {
    const client = new FakeMigrationClient([MIGRATION]);

    expect(await runMigrations(poolFor(client))).toEqual([]);
    expect(client.statements.at(-1)).toBe("COMMIT");
  });

  test("rolls back and releases the client on failure", async () => {
    const client = new FakeMigrationClient([], "interview_sessions");

    await expect(runMigrations(poolFor(client))).rejects.toThrow("syntax error");
    expect(client.statements.at(-1)).toBe("ROLLBACK");
    expect(client.released).toBe(true);
  });
});
