export function ensureQuestionMark(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.endsWith("?") || trimmed.endsWith("？")) return trimmed;
  return `${trimmed.replace(/[.!。]+$/, "")}?`;
}

/** First sentence of the first line. */
export function firstSentence(value: string): string {
  const line = value.trim().split(/\r?\n/)[0] ?? "";
  const match = /^(.+?[.?!？])(\s|$)/.exec(line);
  return match ? match[1].trim() : line.trim();
}

/** Remove repeats ignoring case and whitespace, keeping the first occurrence. */
export function dedupPreserveOrder(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = item.replace(/\s+/g, " ").trim().toLowerCase();
    if (key && !seen.has(key)) {
      seen.add(key);
      out.push(item);
    }
  }
  return out;
}

export function countWords(value: string): number {
  return value.trim().split(/\s+/).filter(Boolean).length;
}
