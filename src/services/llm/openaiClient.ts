import type OpenAI from "openai";
import type { LLMClient } from "./types";
import { ProviderError } from "./types";

const SYSTEM_PROMPT = `You are the evaluation engine of a structured interview.
Respond with exactly one JSON object and nothing else: no markdown, no code fences, no commentary.`;

type OpenAIClientOptions = {
  apiKey: string;
  model: string;
};

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : null;
  }
  return null;
}

/**
 * OpenAI-backed client. The SDK is loaded on first use so that tests and
 * keyless development never import it.
 */
export class OpenAIClient implements LLMClient {
  private sdk: OpenAI | null = null;

  constructor(private readonly options: OpenAIClientOptions) {}

  private async getSdk(): Promise<OpenAI> {
    if (this.sdk) return this.sdk;
    const OpenAISdk = (await import("openai")).default;
    // Retries are handled by the chain executor.
    this.sdk = new OpenAISdk({ apiKey: this.options.apiKey, maxRetries: 0 });
    return this.sdk;
  }

  async call(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    const client = await this.getSdk();
    try {
      const completion = await client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt }
        ],
        temperature,
        max_tokens: maxTokens,
        response_format: { type: "json_object" }
      });
      return completion.choices[0]?.message?.content?.trim() ?? "";
    } catch (error) {
      const status = statusOf(error);
      const message = error instanceof Error ? error.message : String(error);
      if (status !== null) {
        const transient = status === 429 || status >= 500;
        throw new ProviderError(`HTTP ${status}: ${message}`, transient);
      }
      throw error;
    }
  }
}
