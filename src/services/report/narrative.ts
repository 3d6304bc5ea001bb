/**
 * Report narrative: summary, flow rationale, missed opportunities and next
 * actions. The model writes it from the assembled report; a deterministic
 * narrative built from the same facts stands in when the model fails.
 */

import { z } from "zod";
import type { Logger } from "../../config/logger";
import { createNoopLogger } from "../../config/logger";
import { dedupPreserveOrder } from "../../utils/text";
import type { PromptChainExecutor, StageDefinition } from "../chain/executor";
import { text, textList } from "../chain/schemaHelpers";
import type { DossierRecord } from "../evaluation/types";
import type { InterviewContext, Persona } from "../orchestration/types";
import type { NarrativeSource, Report, ReportNarrative } from "./types";

const MAX_MISSED = 5;
const MAX_ACTIONS = 4;

const narrativeSchema = z.object({
  overall_summary: text,
  interview_flow_rationale: text,
  missed_opportunities: textList,
  next_actions: textList
});

export const narrativeStage: StageDefinition<z.infer<typeof narrativeSchema>> = {
  name: "report_narrative",
  temperature: 0.3,
  maxTokens: 1500,
  schema: narrativeSchema,
  template: `You are the head interviewer writing the final interview report for the {job_title} position at {company_name}.
Persona: {persona_description}
Evaluation focus: {evaluation_focus}

The scores and the hiring recommendation are already decided; do not change or restate them as your own judgement.

[Hiring recommendation]
{hiring_recommendation} (weighted score {weighted_score})

[Score aggregation]
{score_aggregation}

[Strength themes]
{strength_themes}

[Weakness themes]
{weakness_themes}

[Per-question digest]
{question_digest}

Write:
- overall_summary: 2-4 short paragraphs.
- interview_flow_rationale: why the questions were asked in this order and what each phase verified.
- missed_opportunities: areas where a strong answer was expected but missing.
- next_actions: concrete preparation steps for the candidate.

Output:
{"overall_summary": "...", "interview_flow_rationale": "...", "missed_opportunities": ["..."], "next_actions": ["..."]}
Return ONLY one JSON object. No markdown, no code fences, no extra text.`
};

type NarrativeFacts = Pick<
  Report,
  "score_aggregation" | "weighted_score" | "gates" | "hiring_recommendation" | "strengths_matrix" | "weaknesses_matrix" | "label_stats"
>;

const RECOMMENDATION_TEXT: Record<Report["hiring_recommendation"], string> = {
  strong_hire: "strong hire",
  hire: "hire",
  lean_hire: "lean hire",
  no_hire: "no hire"
};

/** Narrative derived only from the report facts and dossiers. */
export function fallbackNarrative(facts: NarrativeFacts, dossiers: readonly DossierRecord[]): ReportNarrative {
  const counted = facts.score_aggregation.counted_dossiers;
  const summary = [
    `The candidate gave ${counted} scored answer${counted === 1 ? "" : "s"}, with a weighted score of ${facts.weighted_score} (${RECOMMENDATION_TEXT[facts.hiring_recommendation]}).`
  ];
  if (facts.strengths_matrix.length > 0) {
    summary.push(`Strongest theme: ${facts.strengths_matrix[0].theme}.`);
  }
  if (facts.weaknesses_matrix.length > 0) {
    summary.push(`Main area to improve: ${facts.weaknesses_matrix[0].theme}.`);
  }

  const stats = facts.label_stats;
  const rationale =
    `The interview moved from introduction to core questions and a closing question, ` +
    `with ${stats.main_questions} main question${stats.main_questions === 1 ? "" : "s"} ` +
    `and ${stats.followups} follow-up${stats.followups === 1 ? "" : "s"}.`;

  const missed: string[] = [];
  for (const dossier of dossiers) {
    for (const [component, value] of Object.entries(dossier.extracted)) {
      if (value.trim() === "") missed.push(`Question ${dossier.question_label}: the ${component} was not described.`);
    }
  }

  const actions: string[] = [];
  if (!facts.gates.metrics_passed) actions.push("Quantify results with specific metrics when describing past work.");
  if (!facts.gates.star_passed) actions.push("Structure stories around situation, task, action and result.");
  for (const entry of facts.weaknesses_matrix) {
    actions.push(`Prepare a concrete example that shows ${entry.theme.toLowerCase()}.`);
  }

  return {
    overall_summary: summary.join(" "),
    interview_flow_rationale: rationale,
    missed_opportunities: dedupPreserveOrder(missed).slice(0, MAX_MISSED),
    next_actions: dedupPreserveOrder(actions).slice(0, MAX_ACTIONS)
  };
}

function questionDigest(report: Report): string {
  return report.question_by_question_feedback
    .map((card) => {
      const score = card.main_score === null ? "not scored" : `${card.main_score}/100`;
      const tip = card.overall_tip ? ` tip: ${card.overall_tip}` : "";
      return `- [${card.label}] ${card.question_type} (${card.framework ?? "no framework"}): ${score}.${tip}`;
    })
    .join("\n");
}

export type GenerateNarrativeDeps = {
  executor: PromptChainExecutor;
  logger?: Logger;
};

export async function generateNarrative(
  report: Report,
  dossiers: readonly DossierRecord[],
  context: InterviewContext,
  persona: Persona,
  deps: GenerateNarrativeDeps
): Promise<{ narrative: ReportNarrative; source: NarrativeSource }> {
  const logger = deps.logger ?? createNoopLogger();
  const fallback = fallbackNarrative(report, dossiers);
  const result = await deps.executor.run(narrativeStage, {
    company_name: context.company_name,
    job_title: context.job_title,
    persona_description: persona.persona_description,
    evaluation_focus: persona.evaluation_focus,
    hiring_recommendation: report.hiring_recommendation,
    weighted_score: report.weighted_score,
    score_aggregation: report.score_aggregation,
    strength_themes: report.strengths_matrix.map((entry) => entry.theme),
    weakness_themes: report.weaknesses_matrix.map((entry) => entry.theme),
    question_digest: questionDigest(report) || "(no answers)"
  });

  if (!result.success || !result.data.overall_summary) {
    logger.warn("[report] narrative generation failed, using deterministic narrative", {
      session_id: report.session_id,
      error: result.success ? "empty summary" : result.error
    });
    return { narrative: fallback, source: "fallback" };
  }
  return {
    narrative: {
      overall_summary: result.data.overall_summary,
      interview_flow_rationale: result.data.interview_flow_rationale || fallback.interview_flow_rationale,
      missed_opportunities:
        result.data.missed_opportunities.length > 0 ? result.data.missed_opportunities : fallback.missed_opportunities,
      next_actions: result.data.next_actions.length > 0 ? result.data.next_actions : fallback.next_actions
    },
    source: "llm"
  };
}
