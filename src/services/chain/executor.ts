/**
 * Runs one named prompt stage against the language model and returns a parsed,
 * schema-validated object or a structured error. Malformed output and provider
 * failures never throw past this boundary; template contract errors do.
 */

import type { z } from "zod";
import type { Logger } from "../../config/logger";
import { createNoopLogger, errorMessage, errorMeta } from "../../config/logger";
import { LlmResultCache } from "../llm/cache";
import { callWithRetry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from "../llm/retry";
import type { LLMClient } from "../llm/types";
import { repair } from "./jsonRepair";
import { renderTemplate, type TemplateVariables } from "./template";

export type StageDefinition<T> = {
  name: string;
  template: string;
  temperature: number;
  maxTokens: number;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export type StageFailureKind = "malformed" | "provider" | "aborted";

export type StageResult<T> =
  | { success: true; stage: string; data: T; corrected: boolean; cached: boolean }
  | { success: false; stage: string; kind: StageFailureKind; error: string };

export type StageFailure = Extract<StageResult<unknown>, { success: false }>;

export type RunStageOptions = {
  logger?: Logger;
  cache?: LlmResultCache;
  retry?: RetryOptions;
  signal?: AbortSignal;
};

export const CORRECTION_INSTRUCTION =
  "Return ONLY a valid JSON object that answers the original request, with no markdown and no commentary. " +
  "If a required field is missing, add it with an empty string or [].";

export function buildCorrectionPrompt(originalPrompt: string, malformed: string): string {
  return [
    "Your previous response could not be parsed as the required JSON object.",
    "",
    "[Original request]",
    originalPrompt,
    "",
    "[Previous response]",
    malformed,
    "",
    CORRECTION_INSTRUCTION
  ].join("\n");
}

export function parseStageOutput<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { success: true; data: T } | { success: false; error: string } {
  const repaired = repair(raw);
  if (!repaired) {
    return { success: false, error: "no JSON object found in model output" };
  }
  const result = schema.safeParse(repaired);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { success: false, error: `schema mismatch: ${issues}` };
  }
  return { success: true, data: result.data };
}

function abortedResult(stage: string): StageFailure {
  return { success: false, stage, kind: "aborted", error: "stage cancelled before calling the model" };
}

export async function runStage<T>(
  stage: StageDefinition<T>,
  variables: TemplateVariables,
  llm: LLMClient,
  options: RunStageOptions = {}
): Promise<StageResult<T>> {
  const logger = options.logger ?? createNoopLogger();
  const retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
  const prompt = renderTemplate(stage.template, variables, stage.name);

  const cacheKey = LlmResultCache.keyFor(prompt, stage.temperature, stage.maxTokens);
  const cachedRaw = options.cache?.get(cacheKey);
  if (cachedRaw !== undefined) {
    const cached = parseStageOutput(cachedRaw, stage.schema);
    if (cached.success) {
      return { success: true, stage: stage.name, data: cached.data, corrected: false, cached: true };
    }
  }

  const call = async (text: string): Promise<string> =>
    callWithRetry(llm, text, stage.temperature, stage.maxTokens, {
      ...retry,
      onRetry: (attempt, delayMs, error) => {
        logger.warn("[chain] transient provider error, retrying", {
          stage: stage.name,
          attempt,
          delay_ms: delayMs,
          ...errorMeta(error)
        });
      }
    });

  if (options.signal?.aborted) return abortedResult(stage.name);
  let raw: string;
  try {
    raw = await call(prompt);
  } catch (error) {
    logger.error("[chain] provider call failed", { stage: stage.name, ...errorMeta(error) });
    return { success: false, stage: stage.name, kind: "provider", error: errorMessage(error) };
  }

  const first = parseStageOutput(raw, stage.schema);
  if (first.success) {
    options.cache?.set(cacheKey, raw);
    return { success: true, stage: stage.name, data: first.data, corrected: false, cached: false };
  }

  logger.warn("[chain] malformed stage output, issuing corrective call", {
    stage: stage.name,
    error: first.error
  });
  if (options.signal?.aborted) return abortedResult(stage.name);

  let correctedRaw: string;
  try {
    correctedRaw = await call(buildCorrectionPrompt(prompt, raw));
  } catch (error) {
    logger.error("[chain] provider call failed", { stage: stage.name, ...errorMeta(error) });
    return { success: false, stage: stage.name, kind: "provider", error: errorMessage(error) };
  }

  const second = parseStageOutput(correctedRaw, stage.schema);
  if (second.success) {
    options.cache?.set(cacheKey, correctedRaw);
    return { success: true, stage: stage.name, data: second.data, corrected: true, cached: false };
  }

  logger.warn("[chain] stage failed", { stage: stage.name, error: second.error });
  return { success: false, stage: stage.name, kind: "malformed", error: second.error };
}

/**
 * Binds an LLM client and shared options so callers can run stages by name.
 */
export class PromptChainExecutor {
  constructor(
    private readonly llm: LLMClient,
    private readonly options: Omit<RunStageOptions, "signal"> = {}
  ) {}

  run<T>(
    stage: StageDefinition<T>,
    variables: TemplateVariables,
    signal?: AbortSignal
  ): Promise<StageResult<T>> {
    return runStage(stage, variables, this.llm, { ...this.options, signal });
  }
}
