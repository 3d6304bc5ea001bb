import { createHash } from "node:crypto";

/**
 * Process-wide store of model results keyed by the exact call. Shared by all
 * sessions; holds no session state. Least recently used entries are evicted first.
 */
export class LlmResultCache {
  private readonly entries = new Map<string, string>();

  constructor(private readonly maxEntries = 500) {}

  static keyFor(prompt: string, temperature: number, maxTokens: number): string {
    return createHash("sha256")
      .update(`${temperature}\u0000${maxTokens}\u0000${prompt}`)
      .digest("hex");
  }

  get(key: string): string | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(key: string, value: string): void {
    if (this.maxEntries <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
