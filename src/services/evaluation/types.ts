import type { StageFailureKind } from "../chain/executor";
import type { QuestionType } from "../orchestration/types";

export const FRAMEWORKS = ["STAR", "COMPETENCY", "CASE", "SYSTEMDESIGN"] as const;
export type Framework = (typeof FRAMEWORKS)[number];

export const EXTENSION_KEYS = ["challenge", "learning", "metrics"] as const;
export type ExtensionKey = (typeof EXTENSION_KEYS)[number];

export const ANSWER_INTENTS = [
  "ANSWER",
  "IRRELEVANT",
  "QUESTION",
  "CLARIFICATION_REQUEST",
  "CANNOT_ANSWER"
] as const;
export type AnswerIntent = (typeof ANSWER_INTENTS)[number];

export const EVALUATION_STAGES = [
  "intent",
  "framework",
  "extraction",
  "scoring",
  "explanation",
  "coaching",
  "model_answer",
  "bias_filter"
] as const;
export type EvaluationStage = (typeof EVALUATION_STAGES)[number];

export const EXCLUDED_SCORING_REASON = "excluded from evaluation";

export type CalibrationEntry = {
  element: string;
  given: number;
  max: number;
  gap: number;
  why_not_max: string;
  how_to_improve: string[];
};

export type BiasIssue = {
  span: string;
  category: string;
  reason: string;
  suggested_fix: string;
  severity: "low" | "medium" | "high";
};

export type ModelAnswer = {
  text: string;
  framework: Framework | null;
  selection_reason: string;
};

export type StageFailureRecord = {
  stage: EvaluationStage;
  kind: StageFailureKind;
  error: string;
};

export type Dossier = {
  question_label: string;
  question_type: QuestionType;
  intent: AnswerIntent;
  framework: Framework | null;
  extensions: ExtensionKey[];
  extracted: Record<string, string>;
  /** 0-20 per base component of the framework. */
  scores_main: Record<string, number>;
  /** 0-10 per flagged extension component. */
  scores_ext: Partial<Record<ExtensionKey, number>>;
  scoring_reason: string;
  calibration: CalibrationEntry[];
  ext_calibration: CalibrationEntry[];
  overall_tip: string;
  feedback: string;
  strengths: string[];
  improvements: string[];
  model_answer: ModelAnswer | null;
  bias: { flagged: boolean; issues: BiasIssue[] };
  excluded: boolean;
  failed_stages: StageFailureRecord[];
  skipped_stages: EvaluationStage[];
};

/** Nothing could be evaluated (the provider failed on the first stage). */
export type EvaluationError = {
  error: string;
  failed_stages: StageFailureRecord[];
};

export type EvaluationResult = Dossier | EvaluationError;

export function isEvaluationError(result: EvaluationResult): result is EvaluationError {
  return "error" in result;
}

/**
 * Dossier as the report layer receives it: enum-valued fields are plain strings
 * because they may come back from storage and are validated there.
 */
export type DossierRecord = Omit<Dossier, "question_type" | "intent" | "framework"> & {
  question_type: string;
  intent: string;
  framework: string | null;
};

export function isFramework(value: string): value is Framework {
  return FRAMEWORKS.some((framework) => framework === value);
}

export function isAnswerIntent(value: string): value is AnswerIntent {
  return ANSWER_INTENTS.some((intent) => intent === value);
}

export function isExtensionKey(value: string): value is ExtensionKey {
  return EXTENSION_KEYS.some((key) => key === value);
}
