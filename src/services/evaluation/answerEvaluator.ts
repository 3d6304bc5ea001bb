/**
 * Answer evaluation chain: intent, framework, extraction, scoring, score
 * explanation, coaching, model answer, bias filter.
 *
 * A stage that returns malformed output is recorded and the chain continues
 * with empty inputs. A provider failure or cancellation stops further stage
 * calls; the stages not run are listed in skipped_stages.
 */

import type { Logger } from "../../config/logger";
import { createNoopLogger, errorMeta } from "../../config/logger";
import type { PromptChainExecutor, StageDefinition } from "../chain/executor";
import type { TemplateVariables } from "../chain/template";
import type { InterviewContext, Persona, QuestionType } from "../orchestration/types";
import type { ContextRetriever } from "../retrieval/contextRetriever";
import {
  componentsOf,
  DEFAULT_FRAMEWORK,
  normalizeExtraction,
  normalizeFrameworkName,
  normalizeScores,
  parseFrameworkTag
} from "./frameworks";
import {
  biasFilterStage,
  coachingStage,
  explanationStage,
  extractionStage,
  frameworkStage,
  intentStage,
  modelAnswerStage,
  scoringStage
} from "./stages";
import {
  EVALUATION_STAGES,
  EXCLUDED_SCORING_REASON,
  type AnswerIntent,
  type Dossier,
  type EvaluationResult,
  type EvaluationStage,
  type ExtensionKey,
  type Framework,
  type StageFailureRecord
} from "./types";

/** Types that are asked but never scored. */
export const NON_SCORED_TYPES: readonly QuestionType[] = ["icebreaking", "wrapup", "unknown"];

const MAX_COACHING_ITEMS = 5;
const MODEL_ANSWER_MAX_CHARS = 800;

export type EvaluationContext = {
  label: string;
  questionType: QuestionType;
  interview: InterviewContext;
  persona: Persona;
  expectedPoints: string[];
  retriever: ContextRetriever;
  signal?: AbortSignal;
};

type AnswerEvaluatorDeps = {
  executor: PromptChainExecutor;
  logger?: Logger;
};

function emptyDossier(context: EvaluationContext, intent: AnswerIntent): Dossier {
  return {
    question_label: context.label,
    question_type: context.questionType,
    intent,
    framework: null,
    extensions: [],
    extracted: {},
    scores_main: {},
    scores_ext: {},
    scoring_reason: "",
    calibration: [],
    ext_calibration: [],
    overall_tip: "",
    feedback: "",
    strengths: [],
    improvements: [],
    model_answer: null,
    bias: { flagged: false, issues: [] },
    excluded: false,
    failed_stages: [],
    skipped_stages: []
  };
}

function normalizeForMatch(value: string): string {
  return value
    .toLowerCase()
    .replace(/[“”"]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

const QUOTED_RE = /["“]([^"“”]+)["”]/g;

/**
 * True when the item quotes at least one phrase that appears in the answer.
 * Ellipses inside a quote split it into fragments that must each appear.
 */
export function quotesAnswer(item: string, answer: string): boolean {
  const haystack = normalizeForMatch(answer);
  for (const match of item.matchAll(QUOTED_RE)) {
    const fragments = match[1]
      .split(/\.\.\.|…/)
      .map((fragment) => normalizeForMatch(fragment).replace(/^[\s,.;:!?]+|[\s,.;:!?]+$/g, ""))
      .filter((fragment) => fragment.length > 0);
    if (fragments.length > 0 && fragments.every((fragment) => fragment.length >= 3 && haystack.includes(fragment))) {
      return true;
    }
  }
  return false;
}

export function clampModelAnswer(text: string, maxChars = MODEL_ANSWER_MAX_CHARS): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;
  const head = trimmed.slice(0, maxChars);
  const lastStop = Math.max(head.lastIndexOf(". "), head.lastIndexOf("! "), head.lastIndexOf("? "));
  return lastStop > maxChars / 2 ? head.slice(0, lastStop + 1) : head.trimEnd();
}

function bulletList(items: readonly string[], empty = "(none)"): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : empty;
}

export class AnswerEvaluator {
  private readonly executor: PromptChainExecutor;
  private readonly logger: Logger;

  constructor(deps: AnswerEvaluatorDeps) {
    this.executor = deps.executor;
    this.logger = deps.logger ?? createNoopLogger();
  }

  async evaluate(question: string, answer: string, context: EvaluationContext): Promise<EvaluationResult> {
    const failed: StageFailureRecord[] = [];
    const completed = new Set<EvaluationStage>();
    let halted = false;

    const step = async <T>(
      name: EvaluationStage,
      stage: StageDefinition<T>,
      variables: TemplateVariables
    ): Promise<T | null> => {
      if (halted) return null;
      const result = await this.executor.run(stage, variables, context.signal);
      if (result.success) {
        completed.add(name);
        return result.data;
      }
      failed.push({ stage: name, kind: result.kind, error: result.error });
      if (result.kind !== "malformed") {
        halted = true;
      }
      return null;
    };

    const skippedAfter = (): EvaluationStage[] =>
      EVALUATION_STAGES.filter(
        (stage) => !completed.has(stage) && !failed.some((failure) => failure.stage === stage)
      );

    const baseVariables: TemplateVariables = {
      question,
      answer,
      company_name: context.interview.company_name,
      job_title: context.interview.job_title,
      persona_description: context.persona.persona_description,
      evaluation_focus: context.persona.evaluation_focus,
      question_type: context.questionType,
      expected_points: bulletList(context.expectedPoints),
      resume: context.interview.resume || "(not provided)"
    };

    // 1) Intent
    const intentOut = await step("intent", intentStage, baseVariables);
    if (!intentOut && halted) {
      const reason = failed[0]?.error ?? "intent classification failed";
      this.logger.error("[evaluator] evaluation aborted at first stage", {
        label: context.label,
        error: reason
      });
      return { error: reason, failed_stages: failed };
    }
    const intent: AnswerIntent = intentOut?.intent ?? "ANSWER";
    if (intent !== "ANSWER") {
      return { ...emptyDossier(context, intent), failed_stages: failed };
    }

    if (NON_SCORED_TYPES.includes(context.questionType)) {
      return {
        ...emptyDossier(context, intent),
        excluded: true,
        scoring_reason: EXCLUDED_SCORING_REASON,
        failed_stages: failed
      };
    }

    const dossier = emptyDossier(context, intent);

    // 2) Framework identification
    const frameworkOut = await step("framework", frameworkStage, baseVariables);
    const tag = frameworkOut?.frameworks[0];
    const parsedTag = tag ? parseFrameworkTag(tag) : { framework: null, extensions: [] };
    const framework: Framework = parsedTag.framework ?? DEFAULT_FRAMEWORK;
    const extensions: ExtensionKey[] = parsedTag.extensions;
    dossier.framework = framework;
    dossier.extensions = extensions;

    const components = componentsOf(framework);
    const frameworkVariables: TemplateVariables = {
      ...baseVariables,
      framework_name: framework,
      component_list: JSON.stringify(components),
      extension_list: extensions.length > 0 ? JSON.stringify(extensions) : "[] (none flagged)"
    };

    // 3) Extraction
    const extractionOut = await step("extraction", extractionStage, frameworkVariables);
    dossier.extracted = normalizeExtraction(framework, extractionOut?.extracted ?? {});

    // 4) Scoring
    const hints = await this.lookupHints(question, context);
    const scoringOut = await step("scoring", scoringStage, {
      ...frameworkVariables,
      competency_hints: bulletList(hints),
      extracted: JSON.stringify(dossier.extracted)
    });
    if (scoringOut) {
      const scores = normalizeScores(framework, scoringOut.scores_main, scoringOut.scores_ext, extensions);
      dossier.scores_main = scores.scores_main;
      dossier.scores_ext = scores.scores_ext;
      dossier.scoring_reason = scoringOut.scoring_reason;
    }

    // 5) Score explanation
    const explanationOut = await step("explanation", explanationStage, {
      ...frameworkVariables,
      scores_main: JSON.stringify(dossier.scores_main),
      scores_ext: JSON.stringify(dossier.scores_ext),
      scoring_reason: dossier.scoring_reason
    });
    if (explanationOut) {
      dossier.calibration = explanationOut.calibration.map((entry) => ({
        ...entry,
        how_to_improve: entry.how_to_improve.slice(0, 3)
      }));
      dossier.ext_calibration = explanationOut.ext_calibration.map((entry) => ({
        ...entry,
        how_to_improve: entry.how_to_improve.slice(0, 3)
      }));
      dossier.overall_tip = explanationOut.overall_tip;
    }

    // 6) Coaching
    const coachingOut = await step("coaching", coachingStage, {
      ...frameworkVariables,
      scoring_reason: dossier.scoring_reason
    });
    if (coachingOut) {
      dossier.strengths = this.groundedItems(coachingOut.strengths, answer, context.label, "strengths");
      dossier.improvements = this.groundedItems(coachingOut.improvements, answer, context.label, "improvements");
      dossier.feedback = coachingOut.feedback;
    }

    // 7) Model answer
    const modelOut = await step("model_answer", modelAnswerStage, {
      ...frameworkVariables,
      improvements: bulletList(dossier.improvements)
    });
    if (modelOut) {
      dossier.model_answer = {
        text: clampModelAnswer(modelOut.model_answer),
        framework: normalizeFrameworkName(modelOut.model_answer_framework),
        selection_reason: modelOut.selection_reason
      };
    }

    // 8) Bias filter
    const hasGeneratedText =
      dossier.strengths.length > 0 ||
      dossier.improvements.length > 0 ||
      dossier.feedback.length > 0 ||
      dossier.model_answer !== null;
    if (hasGeneratedText) {
      const biasOut = await step("bias_filter", biasFilterStage, {
        generated_text: JSON.stringify({
          strengths: dossier.strengths,
          improvements: dossier.improvements,
          feedback: dossier.feedback,
          model_answer: dossier.model_answer?.text ?? ""
        })
      });
      if (biasOut?.flagged) {
        this.logger.warn("[evaluator] generated feedback flagged by bias filter", {
          label: context.label,
          issues: biasOut.issues.length
        });
        const sanitized = biasOut.sanitized;
        if (sanitized.strengths.length > 0) dossier.strengths = sanitized.strengths;
        if (sanitized.improvements.length > 0) dossier.improvements = sanitized.improvements;
        if (sanitized.feedback) dossier.feedback = sanitized.feedback;
        if (sanitized.model_answer && dossier.model_answer) {
          dossier.model_answer = { ...dossier.model_answer, text: clampModelAnswer(sanitized.model_answer) };
        }
        dossier.bias = { flagged: true, issues: biasOut.issues };
      } else if (biasOut) {
        dossier.bias = { flagged: false, issues: biasOut.issues };
      }
    } else if (!halted) {
      completed.add("bias_filter");
    }

    dossier.failed_stages = failed;
    dossier.skipped_stages = skippedAfter();
    if (failed.length > 0) {
      this.logger.warn("[evaluator] evaluation completed with failed stages", {
        label: context.label,
        failed: failed.map((failure) => failure.stage),
        skipped: dossier.skipped_stages
      });
    }
    return dossier;
  }

  private async lookupHints(question: string, context: EvaluationContext): Promise<string[]> {
    try {
      return await context.retriever.lookup(`${context.interview.job_title} ${question}`);
    } catch (error) {
      this.logger.warn("[evaluator] competency lookup failed, using session hints", {
        label: context.label,
        ...errorMeta(error)
      });
      return context.interview.competency_hints;
    }
  }

  private groundedItems(items: string[], answer: string, label: string, field: string): string[] {
    const grounded = items.filter((item) => quotesAnswer(item, answer));
    if (grounded.length < items.length) {
      this.logger.debug("[evaluator] dropped coaching items without a quote from the answer", {
        label,
        field,
        dropped: items.length - grounded.length
      });
    }
    return grounded.slice(0, MAX_COACHING_ITEMS);
  }
}
