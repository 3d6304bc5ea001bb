import type { ExtensionKey, Framework } from "../evaluation/types";
import type { LabelStats } from "../orchestration/labels";

export type ScoreAggregation = {
  /** Framework -> average of normalized (0-100) main scores, in framework order. */
  main_avg: Partial<Record<Framework, number>>;
  /** Extension -> average of score x 10 (0-100), in extension order. */
  ext_avg: Partial<Record<ExtensionKey, number>>;
  counted_dossiers: number;
  excluded_dossiers: number;
};

export type HiringRecommendation = "strong_hire" | "hire" | "lean_hire" | "no_hire";

export type HiringGates = {
  metrics_avg: number;
  metrics_passed: boolean;
  /** Null when no STAR answer was scored; the gate then passes. */
  star_avg: number | null;
  star_passed: boolean;
  passed: boolean;
};

export type HiringDecision = {
  weighted_score: number;
  gates: HiringGates;
  recommendation: HiringRecommendation;
};

export type EvidenceEntry = {
  theme: string;
  /** Turn labels supporting the theme, deduplicated, in order of first appearance. */
  evidence: string[];
};

export type QuestionFeedback = {
  label: string;
  question: string;
  question_type: string;
  intent: string;
  framework: string | null;
  /** Main score normalized to 0-100, null when the answer was not scored. */
  main_score: number | null;
  scores_ext: Partial<Record<ExtensionKey, number>>;
  strengths: string[];
  improvements: string[];
  feedback: string;
  overall_tip: string;
  model_answer: string | null;
  excluded: boolean;
  failed_stages: string[];
};

export type ReportNarrative = {
  overall_summary: string;
  interview_flow_rationale: string;
  missed_opportunities: string[];
  next_actions: string[];
};

export type NarrativeSource = "llm" | "fallback";

export type ResumeFeedback = {
  job_fit_assessment: string;
  strengths_and_opportunities: string;
  gaps_and_improvements: string;
  source: NarrativeSource;
};

export type Report = {
  session_id: string;
  overall_summary: string;
  interview_flow_rationale: string;
  strengths_matrix: EvidenceEntry[];
  weaknesses_matrix: EvidenceEntry[];
  score_aggregation: ScoreAggregation;
  weighted_score: number;
  gates: HiringGates;
  hiring_recommendation: HiringRecommendation;
  missed_opportunities: string[];
  next_actions: string[];
  resume_feedback: ResumeFeedback;
  question_by_question_feedback: QuestionFeedback[];
  label_stats: LabelStats;
  validation_errors: string[];
  narrative_source: NarrativeSource;
  version: string;
  created_at: string;
};
