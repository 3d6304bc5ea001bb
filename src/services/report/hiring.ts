/**
 * Hiring recommendation from a score aggregation. Pure: the same aggregation
 * and policy always give the same decision.
 */

import type { Env } from "../../config/env";
import { round2 } from "./aggregate";
import type { HiringDecision, HiringGates, ScoreAggregation } from "./types";

export type HiringPolicy = {
  mainWeight: number;
  extWeight: number;
  strongHireMin: number;
  hireMin: number;
  leanHireMin: number;
  /** Minimum metrics extension average for the top two tiers. */
  metricsGate: number;
  /** Minimum STAR average for the top two tiers, when STAR was used. */
  starGate: number;
};

export const DEFAULT_HIRING_POLICY: HiringPolicy = {
  mainWeight: 0.7,
  extWeight: 0.3,
  strongHireMin: 80,
  hireMin: 70,
  leanHireMin: 60,
  metricsGate: 20,
  starGate: 60
};

export function policyFromEnv(
  config: Pick<
    Env,
    | "HIRING_MAIN_WEIGHT"
    | "HIRING_EXT_WEIGHT"
    | "HIRING_STRONG_HIRE_MIN"
    | "HIRING_HIRE_MIN"
    | "HIRING_LEAN_HIRE_MIN"
    | "HIRING_METRICS_GATE"
    | "HIRING_STAR_GATE"
  >
): HiringPolicy {
  return {
    mainWeight: config.HIRING_MAIN_WEIGHT,
    extWeight: config.HIRING_EXT_WEIGHT,
    strongHireMin: config.HIRING_STRONG_HIRE_MIN,
    hireMin: config.HIRING_HIRE_MIN,
    leanHireMin: config.HIRING_LEAN_HIRE_MIN,
    metricsGate: config.HIRING_METRICS_GATE,
    starGate: config.HIRING_STAR_GATE
  };
}

function meanOf(values: Record<string, number | undefined>): number {
  const present = Object.values(values).filter((value): value is number => value !== undefined);
  return present.length === 0 ? 0 : present.reduce((sum, value) => sum + value, 0) / present.length;
}

/** Unrounded weighted score; tiers are decided on this value. */
export function rawWeightedScore(aggregation: ScoreAggregation, policy: HiringPolicy): number {
  return policy.mainWeight * meanOf(aggregation.main_avg) + policy.extWeight * meanOf(aggregation.ext_avg);
}

// Absorbs floating-point error from the weighting, far below the 0.01 reporting precision.
const THRESHOLD_EPSILON = 1e-9;

function atLeast(value: number, min: number): boolean {
  return value + THRESHOLD_EPSILON >= min;
}

export function evaluateGates(aggregation: ScoreAggregation, policy: HiringPolicy): HiringGates {
  const metricsAvg = aggregation.ext_avg.metrics ?? 0;
  const starAvg = aggregation.main_avg.STAR ?? null;
  const metricsPassed = metricsAvg >= policy.metricsGate;
  const starPassed = starAvg === null || starAvg >= policy.starGate;
  return {
    metrics_avg: metricsAvg,
    metrics_passed: metricsPassed,
    star_avg: starAvg,
    star_passed: starPassed,
    passed: metricsPassed && starPassed
  };
}

/** Tier from an unrounded weighted score and gate outcome. */
export function recommendationFor(
  weighted: number,
  gatesPassed: boolean,
  policy: HiringPolicy
): HiringDecision["recommendation"] {
  if (gatesPassed && atLeast(weighted, policy.strongHireMin)) return "strong_hire";
  if (gatesPassed && atLeast(weighted, policy.hireMin)) return "hire";
  if (atLeast(weighted, policy.leanHireMin)) return "lean_hire";
  return "no_hire";
}

export function decideHiring(aggregation: ScoreAggregation, policy: HiringPolicy = DEFAULT_HIRING_POLICY): HiringDecision {
  const weighted = rawWeightedScore(aggregation, policy);
  const gates = evaluateGates(aggregation, policy);
  return {
    weighted_score: round2(weighted),
    gates,
    recommendation: recommendationFor(weighted, gates.passed, policy)
  };
}
