import fs from "node:fs";
import path from "node:path";
import type { z } from "zod";

const rawCache = new Map<string, unknown>();

function dataPath(fileName: string): string {
  return path.join(path.resolve(process.cwd(), "src", "data"), fileName);
}

/**
 * Load a JSON file from src/data and validate it. The parsed JSON is cached
 * after first read.
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw = rawCache.get(fileName);
  if (raw === undefined) {
    const filePath = dataPath(fileName);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Data file not found: ${fileName} at ${filePath}`);
    }
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    rawCache.set(fileName, raw);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issueText = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid data file ${fileName}: ${issueText}`);
  }
  return parsed.data;
}
