import type { AnswerIntent, Dossier } from "../evaluation/types";

export const QUESTION_TYPES = [
  "icebreaking",
  "self_intro",
  "motivation",
  "star",
  "competency",
  "case",
  "system",
  "hard",
  "wrapup",
  "unknown"
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export function isQuestionType(value: string): value is QuestionType {
  return QUESTION_TYPES.some((type) => type === value);
}

export const PHASE_KEYS = ["intro", "core", "wrapup"] as const;
export type PhaseKey = (typeof PHASE_KEYS)[number];

export type FlowPhase = "INTRO" | "CORE" | "WRAPUP" | "FINISHED";

export type Difficulty = "easy" | "normal" | "hard";
export type PersonaKey = "team_lead" | "executive";

export type Persona = {
  key: PersonaKey;
  persona_description: string;
  evaluation_focus: string;
  question_style_guide: string;
};

export type InterviewContext = {
  company_name: string;
  job_title: string;
  job_description: string;
  resume: string;
  competency_hints: string[];
  language: string;
  difficulty: Difficulty;
  persona: PersonaKey;
};

export type RubricBand = {
  score: number;
  descriptor: string;
};

export type PlanItem = {
  id: string;
  type: QuestionType;
  question: string;
  expected_points: string[];
  rubric: RubricBand[];
};

export type PlanPhase = {
  key: PhaseKey;
  items: PlanItem[];
};

export type Plan = {
  phases: PlanPhase[];
};

export type ServedQuestion = {
  kind: "main" | "followup";
  label: string;
  main_label: string;
  item_id: string;
  question_type: QuestionType;
  question: string;
};

export type FlowState = {
  phase_index: number;
  question_index: number;
  /** Follow-ups served for the current main question. */
  followup_index: number;
  pending_followups: string[];
  last_main_question_id: string | null;
  current: ServedQuestion | null;
  done: boolean;
};

export type TurnRole = "interviewer" | "candidate";

export type Turn = {
  seq: number;
  role: TurnRole;
  label: string;
  text: string;
  question_type: QuestionType;
  intent: AnswerIntent | null;
  dossier: Dossier | null;
  created_at: string;
};

export type NewTurn = Omit<Turn, "seq" | "created_at">;

export type SessionStatus = "active" | "finished";

export type Session = {
  id: string;
  context: InterviewContext;
  plan: Plan;
  flow: FlowState;
  status: SessionStatus;
  plan_source: "llm" | "fallback";
  created_at: string;
  updated_at: string;
};
