/**
 * Final report assembly: aggregation, hiring decision, evidence matrices,
 * per-question feedback cards and referential validation. Validation problems
 * are collected on the report; the report is always returned.
 */

import { isAnswerIntent, isFramework, type DossierRecord } from "../evaluation/types";
import { labelStats } from "../orchestration/labels";
import { isQuestionType, type TurnRole } from "../orchestration/types";
import { aggregate, isAggregatable, mainScorePercent, round2 } from "./aggregate";
import { decideHiring, DEFAULT_HIRING_POLICY, type HiringPolicy } from "./hiring";
import { fallbackNarrative } from "./narrative";
import { fallbackResumeFeedback, type ResumeDocuments } from "./resumeFeedback";
import { KeywordThemeClassifier, type ThemeClassifier } from "./themes";
import type { EvidenceEntry, NarrativeSource, QuestionFeedback, Report, ReportNarrative, ResumeFeedback } from "./types";

export const REPORT_VERSION = "report-v1";

export type ReportTurn = {
  role: TurnRole;
  label: string;
  text: string;
};

export type ReportSession = {
  id: string;
  turns: readonly ReportTurn[];
  /** Documents the resume feedback is derived from when none is given. */
  documents?: ResumeDocuments;
};

export type BuildReportOptions = {
  policy?: HiringPolicy;
  classifier?: ThemeClassifier;
  narrativeSource?: NarrativeSource;
  resumeFeedback?: ResumeFeedback;
  now?: Date;
};

/** Group sentences by theme; labels deduplicated, themes in order of first appearance. */
export function buildEvidenceMatrix(
  dossiers: readonly DossierRecord[],
  pick: (dossier: DossierRecord) => readonly string[],
  classifier: ThemeClassifier
): EvidenceEntry[] {
  const byTheme = new Map<string, string[]>();
  for (const dossier of dossiers) {
    for (const sentence of pick(dossier)) {
      const theme = classifier.classify(sentence);
      const labels = byTheme.get(theme) ?? [];
      if (!labels.includes(dossier.question_label)) labels.push(dossier.question_label);
      byTheme.set(theme, labels);
    }
  }
  return [...byTheme.entries()].map(([theme, evidence]) => ({ theme, evidence }));
}

function feedbackCard(dossier: DossierRecord, questions: ReadonlyMap<string, string>): QuestionFeedback {
  const framework = dossier.framework;
  const mainScore =
    isAggregatable(dossier) && framework !== null && isFramework(framework)
      ? round2(mainScorePercent(framework, dossier.scores_main))
      : null;
  return {
    label: dossier.question_label,
    question: questions.get(dossier.question_label) ?? "",
    question_type: dossier.question_type,
    intent: dossier.intent,
    framework,
    main_score: mainScore,
    scores_ext: dossier.scores_ext,
    strengths: dossier.strengths,
    improvements: dossier.improvements,
    feedback: dossier.feedback,
    overall_tip: dossier.overall_tip,
    model_answer: dossier.model_answer?.text ?? null,
    excluded: dossier.excluded,
    failed_stages: dossier.failed_stages.map((failure) => failure.stage)
  };
}

function checkMatrix(name: string, entries: readonly EvidenceEntry[], knownLabels: ReadonlySet<string>): string[] {
  const errors: string[] = [];
  for (const entry of entries) {
    for (const label of entry.evidence) {
      if (!knownLabels.has(label)) {
        errors.push(`${name} theme "${entry.theme}" references unknown turn label "${label}"`);
      }
    }
  }
  return errors;
}

/**
 * Referential and enum checks over an assembled report: evidence labels must
 * name existing turns, and every question card must carry a recognized intent,
 * question type and framework.
 */
export function validateReport(
  report: Pick<Report, "strengths_matrix" | "weaknesses_matrix" | "question_by_question_feedback">,
  knownLabels: ReadonlySet<string>
): string[] {
  const errors = [
    ...checkMatrix("strengths_matrix", report.strengths_matrix, knownLabels),
    ...checkMatrix("weaknesses_matrix", report.weaknesses_matrix, knownLabels)
  ];
  for (const card of report.question_by_question_feedback) {
    if (!knownLabels.has(card.label)) {
      errors.push(`question "${card.label}" does not match any turn label`);
    }
    if (!isAnswerIntent(card.intent)) {
      errors.push(`question "${card.label}" has unrecognized intent "${card.intent}"`);
    }
    if (!isQuestionType(card.question_type)) {
      errors.push(`question "${card.label}" has unrecognized question type "${card.question_type}"`);
    }
    if (card.framework !== null && !isFramework(card.framework)) {
      errors.push(`question "${card.label}" has unrecognized framework "${card.framework}"`);
    }
  }
  return errors;
}

export function buildReport(
  session: ReportSession,
  dossiers: readonly DossierRecord[],
  narrative: ReportNarrative | null,
  options: BuildReportOptions = {}
): Report {
  const policy = options.policy ?? DEFAULT_HIRING_POLICY;
  const classifier = options.classifier ?? new KeywordThemeClassifier();

  const questions = new Map<string, string>();
  for (const turn of session.turns) {
    if (turn.role === "interviewer" && !questions.has(turn.label)) questions.set(turn.label, turn.text);
  }
  const knownLabels = new Set(session.turns.map((turn) => turn.label));

  const aggregation = aggregate(dossiers);
  const decision = decideHiring(aggregation, policy);
  const strengths = buildEvidenceMatrix(dossiers, (dossier) => dossier.strengths, classifier);
  const weaknesses = buildEvidenceMatrix(dossiers, (dossier) => dossier.improvements, classifier);
  const cards = dossiers.map((dossier) => feedbackCard(dossier, questions));
  const stats = labelStats([...questions.keys()]);

  const facts = {
    score_aggregation: aggregation,
    weighted_score: decision.weighted_score,
    gates: decision.gates,
    hiring_recommendation: decision.recommendation,
    strengths_matrix: strengths,
    weaknesses_matrix: weaknesses,
    label_stats: stats
  };
  const text = narrative ?? fallbackNarrative(facts, dossiers);

  return {
    session_id: session.id,
    overall_summary: text.overall_summary,
    interview_flow_rationale: text.interview_flow_rationale,
    ...facts,
    missed_opportunities: text.missed_opportunities,
    next_actions: text.next_actions,
    resume_feedback:
      options.resumeFeedback ?? fallbackResumeFeedback(session.documents ?? { resume: "", job_description: "" }),
    question_by_question_feedback: cards,
    validation_errors: validateReport(
      { strengths_matrix: strengths, weaknesses_matrix: weaknesses, question_by_question_feedback: cards },
      knownLabels
    ),
    narrative_source: narrative ? (options.narrativeSource ?? "llm") : "fallback",
    version: REPORT_VERSION,
    created_at: (options.now ?? new Date()).toISOString()
  };
}
