/**
 * Follow-up thresholds and caps.
 */

import type { QuestionType } from "../orchestration/types";

/** Question types that only get a light, length-triggered follow-up. */
export const LIGHTWEIGHT_TYPES: readonly QuestionType[] = ["icebreaking", "self_intro", "motivation"];

/** Minimum trimmed answer length per lightweight type; shorter answers get one soft follow-up. */
export const MIN_ANSWER_LENGTH: Partial<Record<QuestionType, number>> = {
  icebreaking: 25,
  self_intro: 40,
  motivation: 40
};

/** Follow-ups returned by one decision. */
export const MAX_FOLLOWUPS_PER_DECISION = 2;

/** Pending queue length, and total follow-ups served for one main question. */
export const MAX_PENDING_FOLLOWUPS = 3;
export const MAX_FOLLOWUPS_PER_QUESTION = 3;

/** Below either of these a substantive answer is too sparse for the model to reason about. */
export const SPARSE_ANSWER_MIN_CHARS = 30;
export const SPARSE_ANSWER_MIN_WORDS = 6;

/** A base component scored under this (of 20) counts as a rubric gap. */
export const RUBRIC_GAP_THRESHOLD = 15;

export const SOFT_FOLLOWUP_MAX_CHARS = 80;

/** Overlap ratio of content words at which two questions count as the same. */
export const DUPLICATE_OVERLAP_THRESHOLD = 0.65;
