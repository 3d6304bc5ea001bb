import { createApp } from "./app";
import { env } from "./config/env";
import { createLogger, errorMeta } from "./config/logger";
import { createContainer } from "./container";
import { assertDatabaseConnection, createPool, poolQueryable } from "./db/pool";
import { OpenAIClient } from "./services/llm/openaiClient";
import { InMemorySessionRepository } from "./services/persistence/memoryRepository";
import { PgSessionRepository } from "./services/persistence/pgRepository";
import type { SessionRepository } from "./services/persistence/types";

const logger = createLogger({ level: env.LOG_LEVEL });

async function createRepository(): Promise<SessionRepository> {
  if (!env.DATABASE_URL) {
    logger.warn("DATABASE_URL not set; sessions are kept in memory");
    return new InMemorySessionRepository();
  }
  const pool = createPool(env.DATABASE_URL);
  await assertDatabaseConnection(pool);
  return new PgSessionRepository(poolQueryable(pool));
}

async function bootstrap(): Promise<void> {
  if (!env.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is required");
  }
  const repository = await createRepository();
  const { service } = createContainer({
    config: env,
    logger,
    llm: new OpenAIClient({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }),
    repository
  });
  const app = createApp({ service, logger, frontendOrigin: env.FRONTEND_ORIGIN });
  app.listen(env.PORT, () => {
    logger.info(`Interview engine listening on http://localhost:${env.PORT}`);
  });
}

bootstrap().catch((error: unknown) => {
  logger.error("Failed to start server", errorMeta(error));
  process.exit(1);
});
