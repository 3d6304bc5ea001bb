/**
 * Turn labels: "N" for the N-th main question of the plan, "N-M" for its M-th follow-up.
 */

export type ParsedLabel = { main: number; followup: number | null };

const LABEL_RE = /^(\d+)(?:-(\d+))?$/;

export function parseLabel(label: string): ParsedLabel | null {
  const match = LABEL_RE.exec(label.trim());
  if (!match) return null;
  const main = Number(match[1]);
  const followup = match[2] === undefined ? null : Number(match[2]);
  if (main < 1 || (followup !== null && followup < 1)) return null;
  return { main, followup };
}

export function followUpLabel(mainLabel: string, index: number): string {
  return `${mainLabel}-${index}`;
}

export type LabelStats = {
  main_questions: number;
  followups: number;
  /** Follow-up count per main label, in order of first appearance. */
  followups_by_main: Record<string, number>;
};

export function labelStats(labels: readonly string[]): LabelStats {
  const mains = new Set<number>();
  const byMain: Record<string, number> = {};
  let followups = 0;
  for (const label of labels) {
    const parsed = parseLabel(label);
    if (!parsed) continue;
    mains.add(parsed.main);
    const key = String(parsed.main);
    byMain[key] = byMain[key] ?? 0;
    if (parsed.followup !== null) {
      byMain[key] += 1;
      followups += 1;
    }
  }
  return { main_questions: mains.size, followups, followups_by_main: byMain };
}
