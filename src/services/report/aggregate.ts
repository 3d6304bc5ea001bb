/**
 * Per-question scores onto a common 0-100 scale, averaged by framework and by
 * extension. Output keys follow FRAMEWORKS / EXTENSION_KEYS order, so the result
 * does not depend on dossier order.
 */

import { componentsOf, EXTENSION_COMPONENT_MAX, MAIN_COMPONENT_MAX } from "../evaluation/frameworks";
import {
  EXTENSION_KEYS,
  FRAMEWORKS,
  isFramework,
  type DossierRecord,
  type ExtensionKey,
  type Framework
} from "../evaluation/types";
import type { ScoreAggregation } from "./types";

/** Types that never contribute to the aggregation. */
export const NON_AGGREGATED_TYPES: readonly string[] = ["icebreaking", "wrapup", "unknown"];

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** sum(scores_main) / (20 x component count) x 100 over the framework's declared components. */
export function mainScorePercent(framework: Framework, scoresMain: Record<string, number>): number {
  const components = componentsOf(framework);
  const total = components.reduce((sum, component) => sum + (scoresMain[component] ?? 0), 0);
  return (total / (MAIN_COMPONENT_MAX * components.length)) * 100;
}

export function extensionScorePercent(score: number): number {
  return score * (100 / EXTENSION_COMPONENT_MAX);
}

/**
 * True when the dossier counts toward the aggregation: a scored answer of a
 * scored type, with a known framework and at least one main score.
 */
export function isAggregatable(dossier: DossierRecord): boolean {
  if (NON_AGGREGATED_TYPES.includes(dossier.question_type)) return false;
  if (dossier.excluded || dossier.intent !== "ANSWER") return false;
  if (dossier.framework === null || !isFramework(dossier.framework)) return false;
  return Object.keys(dossier.scores_main).length > 0;
}

export function aggregate(dossiers: readonly DossierRecord[]): ScoreAggregation {
  const mainScores = new Map<Framework, number[]>();
  const extScores = new Map<ExtensionKey, number[]>();
  let counted = 0;

  for (const dossier of dossiers) {
    const framework = dossier.framework;
    if (!isAggregatable(dossier) || framework === null || !isFramework(framework)) continue;
    counted += 1;
    const main = mainScores.get(framework) ?? [];
    main.push(mainScorePercent(framework, dossier.scores_main));
    mainScores.set(framework, main);

    for (const key of EXTENSION_KEYS) {
      const score = dossier.scores_ext[key];
      if (score === undefined) continue;
      const ext = extScores.get(key) ?? [];
      ext.push(extensionScorePercent(score));
      extScores.set(key, ext);
    }
  }

  const main_avg: Partial<Record<Framework, number>> = {};
  for (const framework of FRAMEWORKS) {
    const values = mainScores.get(framework);
    if (values) main_avg[framework] = round2(mean(values));
  }
  const ext_avg: Partial<Record<ExtensionKey, number>> = {};
  for (const key of EXTENSION_KEYS) {
    const values = extScores.get(key);
    if (values) ext_avg[key] = round2(mean(values));
  }

  return {
    main_avg,
    ext_avg,
    counted_dossiers: counted,
    excluded_dossiers: dossiers.length - counted
  };
}
