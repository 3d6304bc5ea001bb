import { env } from "../config/env";
import { createLogger, errorMeta } from "../config/logger";
import { runMigrations } from "./migrationRunner";
import { createPool, migrationPool } from "./pool";

const logger = createLogger({ level: env.LOG_LEVEL });

async function main(): Promise<void> {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL is required to run migrations");
  }
  const pool = createPool(env.DATABASE_URL);
  try {
    const applied = await runMigrations(migrationPool(pool));
    if (applied.length === 0) {
      logger.info("No new migrations to apply.");
    } else {
      logger.info("Applied migrations", { files: applied });
    }
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error("Migration failed", errorMeta(error));
  process.exitCode = 1;
});
