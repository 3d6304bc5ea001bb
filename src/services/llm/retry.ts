import type { LLMClient } from "./types";
import { ProviderError } from "./types";

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
};

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  timeoutMs: 30_000
};

const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /econnreset/i,
  /econnrefused/i,
  /etimedout/i,
  /socket hang up/i,
  /network/i,
  /\b429\b/,
  /rate limit/i,
  /http 50[0234]\b/i
];

export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderError) return error.transient;
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new ProviderError(`LLM call timed out after ${timeoutMs}ms`, true));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Call the model, retrying transient failures with exponential backoff.
 * Non-transient errors and an exhausted budget are rethrown to the caller.
 */
export async function callWithRetry(
  llm: LLMClient,
  prompt: string,
  temperature: number,
  maxTokens: number,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<string> {
  const sleep = options.sleep ?? defaultSleep;
  let attempt = 0;
  for (;;) {
    attempt += 1;
    try {
      return await withTimeout(llm.call(prompt, temperature, maxTokens), options.timeoutMs);
    } catch (error) {
      if (!isTransientError(error) || attempt >= options.maxAttempts) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options.baseDelayMs);
      options.onRetry?.(attempt, delayMs, error);
      await sleep(delayMs);
    }
  }
}
