/**
 * Language-model capability consumed by the engine: given a prompt, return text
 * (nominally a JSON object, possibly malformed).
 */
export interface LLMClient {
  call(prompt: string, temperature: number, maxTokens: number): Promise<string>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/** Raised when the provider stays unavailable where the caller cannot degrade (session start). */
export class ProviderUnavailableError extends Error {
  constructor(public readonly stage: string, detail: string) {
    super(`LLM provider unavailable during ${stage}: ${detail}`);
    this.name = "ProviderUnavailableError";
  }
}
