/**
 * Competency and company-context hints used to ground scoring. The production
 * vector search sits behind this interface; the static implementation ranks the
 * hints supplied with the session.
 */
export interface ContextRetriever {
  lookup(query: string): Promise<string[]>;
}

function tokens(value: string): Set<string> {
  return new Set((value.toLowerCase().match(/[a-z0-9]{3,}/g) ?? []).filter(Boolean));
}

export class StaticContextRetriever implements ContextRetriever {
  constructor(
    private readonly hints: readonly string[],
    private readonly limit = 5
  ) {}

  async lookup(query: string): Promise<string[]> {
    const queryTokens = tokens(query);
    const ranked = this.hints
      .map((hint, index) => {
        let overlap = 0;
        for (const token of tokens(hint)) {
          if (queryTokens.has(token)) overlap += 1;
        }
        return { hint, index, overlap };
      })
      .sort((a, b) => b.overlap - a.overlap || a.index - b.index);
    const matching = ranked.filter((entry) => entry.overlap > 0);
    const chosen = matching.length > 0 ? matching : ranked;
    return chosen.slice(0, this.limit).map((entry) => entry.hint);
  }
}
