import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  /** When unset, sessions live in memory for the lifetime of the process. */
  DATABASE_URL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LLM_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),
  LLM_CACHE_SIZE: z.coerce.number().int().min(0).default(500),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Comma-separated origins for CORS (e.g. https://yourapp.example.com). */
  FRONTEND_ORIGIN: z.string().optional(),
  HIRING_MAIN_WEIGHT: z.coerce.number().min(0).max(1).default(0.7),
  HIRING_EXT_WEIGHT: z.coerce.number().min(0).max(1).default(0.3),
  HIRING_STRONG_HIRE_MIN: z.coerce.number().default(80),
  HIRING_HIRE_MIN: z.coerce.number().default(70),
  HIRING_LEAN_HIRE_MIN: z.coerce.number().default(60),
  HIRING_METRICS_GATE: z.coerce.number().default(20),
  HIRING_STAR_GATE: z.coerce.number().default(60)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issueText = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${issueText}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);
