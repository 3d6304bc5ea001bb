import { describe, expect, test, vi } from "vitest";
import { backoffDelay, callWithRetry, isTransientError, withTimeout } from "../src/services/llm/retry";
import { ProviderError } from "../src/services/llm/types";
import { ScriptedLLM } from "./helpers";

describe("isTransientError", () => {
  test("trusts the flag on provider errors", () => {
    expect(isTransientError(new ProviderError("HTTP 429: slow down", true))).toBe(true);
    expect(isTransientError(new ProviderError("HTTP 400: bad request", false))).toBe(false);
  });

  test("recognizes network and rate-limit messages on other errors", () => {
    expect(isTransientError(new Error("socket hang up"))).toBe(true);
    expect(isTransientError(new Error("read ECONNRESET"))).toBe(true);
    expect(isTransientError(new Error("Rate limit reached"))).toBe(true);
    expect(isTransientError(new Error("HTTP 502 from upstream"))).toBe(true);
    expect(isTransientError(new Error("Incorrect API key provided"))).toBe(false);
    expect(isTransientError("plain failure")).toBe(false);
  });
});

describe("callWithRetry", () => {
  test("doubles the delay between attempts and rethrows the last error", async () => {
    const llm = new ScriptedLLM([
      new ProviderError("HTTP 503: busy", true),
      new ProviderError("HTTP 503: busy", true),
      new ProviderError("HTTP 503: down", true)
    ]);
    const delays: number[] = [];
    const onRetry = vi.fn();

    await expect(
      callWithRetry(llm, "prompt", 0, 10, {
        maxAttempts: 3,
        baseDelayMs: 100,
        timeoutMs: 1000,
        sleep: async (ms) => {
          delays.push(ms);
        },
        onRetry
      })
    ).rejects.toThrow("HTTP 503: down");

    expect(delays).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(llm.prompts).toHaveLength(3);
  });

  test("returns as soon as one attempt succeeds", async () => {
    const llm = new ScriptedLLM([new Error("network error"), '{"ok": true}']);
    const result = await callWithRetry(llm, "prompt", 0, 10, {
      maxAttempts: 3,
      baseDelayMs: 0,
      timeoutMs: 1000,
      sleep: async () => undefined
    });
    expect(result).toBe('{"ok": true}');
  });
});

describe("withTimeout", () => {
  test("rejects with a transient provider error after the deadline", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 50);
    const assertion = expect(pending).rejects.toThrow("LLM call timed out after 50ms");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  test("resolves with the wrapped value in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50)).resolves.toBe("done");
  });

  test("backoffDelay grows exponentially", () => {
    expect(backoffDelay(1, 100)).toBe(100);
    expect(backoffDelay(3, 100)).toBe(400);
  });
});
