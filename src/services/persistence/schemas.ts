/**
 * Schemas for records read back from storage. Enum fields are checked strictly;
 * a stored value outside its enum is a corrupted record.
 */

import { z } from "zod";
import {
  ANSWER_INTENTS,
  EVALUATION_STAGES,
  EXTENSION_KEYS,
  FRAMEWORKS,
  type Dossier
} from "../evaluation/types";
import {
  PHASE_KEYS,
  QUESTION_TYPES,
  type FlowState,
  type InterviewContext,
  type Plan,
  type Turn
} from "../orchestration/types";
import type { Report } from "../report/types";

export const timestamp = z.union([z.string(), z.date()]).transform((value) =>
  value instanceof Date ? value.toISOString() : new Date(value).toISOString()
);

const extScoresSchema = z.object({
  challenge: z.number().optional(),
  learning: z.number().optional(),
  metrics: z.number().optional()
});

const calibrationSchema = z.object({
  element: z.string(),
  given: z.number(),
  max: z.number(),
  gap: z.number(),
  why_not_max: z.string(),
  how_to_improve: z.array(z.string())
});

export const dossierSchema: z.ZodType<Dossier, z.ZodTypeDef, unknown> = z.object({
  question_label: z.string(),
  question_type: z.enum(QUESTION_TYPES),
  intent: z.enum(ANSWER_INTENTS),
  framework: z.enum(FRAMEWORKS).nullable(),
  extensions: z.array(z.enum(EXTENSION_KEYS)),
  extracted: z.record(z.string(), z.string()),
  scores_main: z.record(z.string(), z.number()),
  scores_ext: extScoresSchema,
  scoring_reason: z.string(),
  calibration: z.array(calibrationSchema),
  ext_calibration: z.array(calibrationSchema),
  overall_tip: z.string(),
  feedback: z.string(),
  strengths: z.array(z.string()),
  improvements: z.array(z.string()),
  model_answer: z
    .object({
      text: z.string(),
      framework: z.enum(FRAMEWORKS).nullable(),
      selection_reason: z.string()
    })
    .nullable(),
  bias: z.object({
    flagged: z.boolean(),
    issues: z.array(
      z.object({
        span: z.string(),
        category: z.string(),
        reason: z.string(),
        suggested_fix: z.string(),
        severity: z.enum(["low", "medium", "high"])
      })
    )
  }),
  excluded: z.boolean(),
  failed_stages: z.array(
    z.object({
      stage: z.enum(EVALUATION_STAGES),
      kind: z.enum(["malformed", "provider", "aborted"]),
      error: z.string()
    })
  ),
  skipped_stages: z.array(z.enum(EVALUATION_STAGES))
});

export const interviewContextSchema: z.ZodType<InterviewContext, z.ZodTypeDef, unknown> = z.object({
  company_name: z.string(),
  job_title: z.string(),
  job_description: z.string(),
  resume: z.string(),
  competency_hints: z.array(z.string()),
  language: z.string(),
  difficulty: z.enum(["easy", "normal", "hard"]),
  persona: z.enum(["team_lead", "executive"])
});

export const planSchema: z.ZodType<Plan, z.ZodTypeDef, unknown> = z.object({
  phases: z.array(
    z.object({
      key: z.enum(PHASE_KEYS),
      items: z.array(
        z.object({
          id: z.string(),
          type: z.enum(QUESTION_TYPES),
          question: z.string(),
          expected_points: z.array(z.string()),
          rubric: z.array(z.object({ score: z.number(), descriptor: z.string() }))
        })
      )
    })
  )
});

const servedQuestionSchema = z.object({
  kind: z.enum(["main", "followup"]),
  label: z.string(),
  main_label: z.string(),
  item_id: z.string(),
  question_type: z.enum(QUESTION_TYPES),
  question: z.string()
});

export const flowStateSchema: z.ZodType<FlowState, z.ZodTypeDef, unknown> = z.object({
  phase_index: z.number().int().min(0),
  question_index: z.number().int().min(0),
  followup_index: z.number().int().min(0),
  pending_followups: z.array(z.string()),
  last_main_question_id: z.string().nullable(),
  current: servedQuestionSchema.nullable(),
  done: z.boolean()
});

export const turnRowSchema = z.object({
  seq: z.coerce.number().int(),
  role: z.enum(["interviewer", "candidate"]),
  label: z.string(),
  text: z.string(),
  question_type: z.enum(QUESTION_TYPES),
  intent: z.enum(ANSWER_INTENTS).nullable(),
  dossier_json: dossierSchema.nullable(),
  created_at: timestamp
});

export function turnFromRow(row: z.infer<typeof turnRowSchema>): Turn {
  return {
    seq: row.seq,
    role: row.role,
    label: row.label,
    text: row.text,
    question_type: row.question_type,
    intent: row.intent,
    dossier: row.dossier_json,
    created_at: row.created_at
  };
}

export const sessionRowSchema = z.object({
  id: z.string(),
  context_json: interviewContextSchema,
  plan_json: planSchema,
  flow_json: flowStateSchema,
  status: z.enum(["active", "finished"]),
  plan_source: z.enum(["llm", "fallback"]),
  created_at: timestamp,
  updated_at: timestamp
});

const evidenceSchema = z.object({ theme: z.string(), evidence: z.array(z.string()) });

export const reportSchema: z.ZodType<Report, z.ZodTypeDef, unknown> = z.object({
  session_id: z.string(),
  overall_summary: z.string(),
  interview_flow_rationale: z.string(),
  strengths_matrix: z.array(evidenceSchema),
  weaknesses_matrix: z.array(evidenceSchema),
  score_aggregation: z.object({
    main_avg: z.object({
      STAR: z.number().optional(),
      COMPETENCY: z.number().optional(),
      CASE: z.number().optional(),
      SYSTEMDESIGN: z.number().optional()
    }),
    ext_avg: extScoresSchema,
    counted_dossiers: z.number(),
    excluded_dossiers: z.number()
  }),
  weighted_score: z.number(),
  gates: z.object({
    metrics_avg: z.number(),
    metrics_passed: z.boolean(),
    star_avg: z.number().nullable(),
    star_passed: z.boolean(),
    passed: z.boolean()
  }),
  hiring_recommendation: z.enum(["strong_hire", "hire", "lean_hire", "no_hire"]),
  missed_opportunities: z.array(z.string()),
  next_actions: z.array(z.string()),
  resume_feedback: z.object({
    job_fit_assessment: z.string(),
    strengths_and_opportunities: z.string(),
    gaps_and_improvements: z.string(),
    source: z.enum(["llm", "fallback"])
  }),
  question_by_question_feedback: z.array(
    z.object({
      label: z.string(),
      question: z.string(),
      question_type: z.string(),
      intent: z.string(),
      framework: z.string().nullable(),
      main_score: z.number().nullable(),
      scores_ext: extScoresSchema,
      strengths: z.array(z.string()),
      improvements: z.array(z.string()),
      feedback: z.string(),
      overall_tip: z.string(),
      model_answer: z.string().nullable(),
      excluded: z.boolean(),
      failed_stages: z.array(z.string())
    })
  ),
  label_stats: z.object({
    main_questions: z.number(),
    followups: z.number(),
    followups_by_main: z.record(z.string(), z.number())
  }),
  validation_errors: z.array(z.string()),
  narrative_source: z.enum(["llm", "fallback"]),
  version: z.string(),
  created_at: z.string()
});
