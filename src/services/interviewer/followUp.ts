/**
 * Decide whether to ask follow-ups after an evaluated answer, and generate them.
 *
 * Lightweight turns (icebreaking, self intro, motivation) get one soft follow-up
 * when the answer is shorter than the type's minimum. Substantive turns follow
 * the evaluator's rubric-gap signal; a confident claim with no concrete example
 * always gets an evidence-demand follow-up first. Template pools back up the
 * model, and every template fallback is flagged.
 */

import { z } from "zod";
import type { Logger } from "../../config/logger";
import { createNoopLogger } from "../../config/logger";
import { loadDataFile } from "../../utils/dataFile";
import { countWords, dedupPreserveOrder, ensureQuestionMark } from "../../utils/text";
import type { PromptChainExecutor } from "../chain/executor";
import { renderTemplate } from "../chain/template";
import type { Dossier } from "../evaluation/types";
import type { InterviewContext, Persona, QuestionType } from "../orchestration/types";
import {
  DUPLICATE_OVERLAP_THRESHOLD,
  LIGHTWEIGHT_TYPES,
  MAX_FOLLOWUPS_PER_DECISION,
  MIN_ANSWER_LENGTH,
  RUBRIC_GAP_THRESHOLD,
  SOFT_FOLLOWUP_MAX_CHARS,
  SPARSE_ANSWER_MIN_CHARS,
  SPARSE_ANSWER_MIN_WORDS
} from "./constants";
import { sanitizeAgainstResume } from "./resumeSanitizer";
import { followUpStage, softFollowUpStage } from "./stages";

const templatesSchema = z.object({
  soft: z.object({
    icebreaking: z.array(z.string()).min(1),
    self_intro: z.array(z.string()).min(1),
    motivation: z.array(z.string()).min(1)
  }),
  substantive: z.record(z.string(), z.array(z.string()).min(1)),
  evidence: z.array(z.string()).min(1),
  transition: z.string().min(1)
});

export type FollowUpTemplates = z.infer<typeof templatesSchema>;

export function loadFollowUpTemplates(): FollowUpTemplates {
  return loadDataFile("followupTemplates.json", templatesSchema);
}

export type FollowUpSource = "none" | "soft_llm" | "soft_template" | "evidence" | "llm" | "template";

export type FollowUpDecision = {
  followups: string[];
  sources: FollowUpSource[];
  /** True when a template pool stood in for the model. */
  fallback_used: boolean;
  transition_phrase: string;
  reason: string;
};

export type FollowUpInput = {
  questionType: QuestionType;
  question: string;
  answer: string;
  dossier: Dossier | null;
  expectedPoints: string[];
  interview: InterviewContext;
  persona: Persona;
  /** Every question already put to the candidate in this session. */
  askedQuestions: string[];
  signal?: AbortSignal;
};

type FollowUpGeneratorDeps = {
  executor: PromptChainExecutor;
  logger?: Logger;
  random?: () => number;
  templates?: FollowUpTemplates;
};

// --- Answer signals ---

const ASSERTION_PATTERNS = [
  /\bi(?:'m| am)\s+(?:very\s+|really\s+|extremely\s+|absolutely\s+)?(?:confident|sure|certain|passionate|the best|perfect|ideal|a (?:fast|quick) learner|(?:great|excellent|good) at)\b/i,
  /\bi (?:can|will) (?:definitely|easily|surely|absolutely|certainly)\b/i,
  /\bi (?:always|never) (?:deliver|fail|give up|miss|succeed)\b/i,
  /\bi (?:want|aim|plan|hope|intend) to (?:become|be) (?:the best|the top|a leader|the leader)\b/i,
  /\bi(?:'m| am) (?:ready|able) to (?:handle|do|take on) anything\b/i,
  /\bno doubt\b/i
];

const EVIDENCE_PATTERNS = [
  /\bfor (?:example|instance)\b/i,
  /\bwhen i\b/i,
  /\bat (?:my|our) (?:previous|last|current|former)\b/i,
  /\bin (?:my|our|the) (?:project|team|role|internship|company|job)\b/i,
  /\d/,
  /\b(?:led|built|launched|shipped|designed|implemented|reduced|increased|improved|delivered|managed|created|developed|migrated|fixed|organized)\b/i
];

/** A claim of confidence or ambition with nothing concrete to back it. */
export function isUnsupportedAssertion(answer: string): boolean {
  return (
    ASSERTION_PATTERNS.some((pattern) => pattern.test(answer)) &&
    !EVIDENCE_PATTERNS.some((pattern) => pattern.test(answer))
  );
}

export function isSparseAnswer(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed.length < SPARSE_ANSWER_MIN_CHARS || countWords(trimmed) < SPARSE_ANSWER_MIN_WORDS;
}

export function isTooShortForType(questionType: QuestionType, answer: string): boolean {
  const minimum = MIN_ANSWER_LENGTH[questionType];
  return minimum !== undefined && answer.trim().length < minimum;
}

/** Rubric-gap signal from the evaluator's dossier. */
export function hasRubricGap(dossier: Dossier | null): boolean {
  if (!dossier) return true;
  const scoringMissing =
    dossier.failed_stages.some((failure) => failure.stage === "scoring") ||
    dossier.skipped_stages.includes("scoring");
  if (scoringMissing) return true;
  if (Object.values(dossier.extracted).some((value) => value.trim() === "")) return true;
  return Object.values(dossier.scores_main).some((score) => score < RUBRIC_GAP_THRESHOLD);
}

export function isAcceptableSoftFollowUp(question: string): boolean {
  return (
    question.length > 0 &&
    question.length <= SOFT_FOLLOWUP_MAX_CHARS &&
    !/[!?]{3,}/.test(question) &&
    !/\p{Extended_Pictographic}/u.test(question)
  );
}

// --- Near-duplicate detection ---

const STOPWORDS = new Set([
  "a", "an", "and", "are", "be", "been", "being", "by", "can", "could", "did", "do", "does",
  "for", "had", "has", "have", "how", "in", "is", "it", "its", "may", "might", "me", "of", "on",
  "or", "our", "should", "that", "the", "this", "to", "was", "were", "we", "what", "will",
  "would", "you", "your"
]);

function stem(word: string): string {
  if (word.length <= 4) return word;
  if (word.endsWith("ing") && word.length > 5) return word.slice(0, -3);
  if (word.endsWith("ed") && word.length > 4) return word.slice(0, -2);
  if (word.endsWith("ly") && word.length > 4) return word.slice(0, -2);
  if (word.endsWith("s") && !word.endsWith("ss") && word.length > 3) return word.slice(0, -1);
  return word;
}

export function contentWords(value: string): Set<string> {
  const normalized = value
    .toLowerCase()
    .replace(/['’]/g, " ")
    .replace(/[^\w\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  const out = new Set<string>();
  for (const token of normalized.split(" ")) {
    if (!token || STOPWORDS.has(token)) continue;
    const stemmed = stem(token);
    if (stemmed.length >= 2) out.add(stemmed);
  }
  return out;
}

function overlapRatio(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared += 1;
  }
  return shared / Math.min(a.size, b.size);
}

export function isNearDuplicate(question: string, existing: readonly string[]): boolean {
  const words = contentWords(question);
  if (words.size === 0) return false;
  return existing.some((other) => overlapRatio(words, contentWords(other)) >= DUPLICATE_OVERLAP_THRESHOLD);
}

/** Expected points whose content words the answer mostly does not mention. */
export function unmetExpectedPoints(points: readonly string[], answer: string): string[] {
  const answerWords = contentWords(answer);
  return points.filter((point) => {
    const pointWords = contentWords(point);
    if (pointWords.size === 0) return false;
    let covered = 0;
    for (const word of pointWords) {
      if (answerWords.has(word)) covered += 1;
    }
    return covered / pointWords.size < 0.5;
  });
}

// --- Generator ---

type Candidate = { text: string; source: FollowUpSource };

export class FollowUpGenerator {
  private readonly executor: PromptChainExecutor;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly templatesOverride: FollowUpTemplates | undefined;

  constructor(deps: FollowUpGeneratorDeps) {
    this.executor = deps.executor;
    this.logger = deps.logger ?? createNoopLogger();
    this.random = deps.random ?? Math.random;
    this.templatesOverride = deps.templates;
  }

  private get templates(): FollowUpTemplates {
    return this.templatesOverride ?? loadFollowUpTemplates();
  }

  async decide(input: FollowUpInput): Promise<FollowUpDecision> {
    const transition = this.templates.transition;
    if (input.questionType === "wrapup" || input.questionType === "unknown") {
      return this.finish(input, [], transition, "no follow-ups for this question type");
    }
    if (LIGHTWEIGHT_TYPES.includes(input.questionType)) {
      return this.decideLightweight(input, transition);
    }
    return this.decideSubstantive(input, transition);
  }

  private async decideLightweight(input: FollowUpInput, transition: string): Promise<FollowUpDecision> {
    if (!isTooShortForType(input.questionType, input.answer)) {
      return this.finish(input, [], transition, "answer meets the minimum length");
    }

    const result = await this.executor.run(
      softFollowUpStage,
      {
        ...this.contextVariables(input),
        deficit_hint: this.deficitHint(input.questionType)
      },
      input.signal
    );
    const proposed = result.success ? result.data.follow_up_question : "";
    if (isAcceptableSoftFollowUp(proposed)) {
      return this.finish(input, [{ text: proposed, source: "soft_llm" }], transition, "answer shorter than minimum");
    }

    const pool = this.softPool(input.questionType);
    const candidates = pool.length > 0 ? [{ text: this.pick(pool, input), source: "soft_template" as const }] : [];
    return this.finish(input, candidates, transition, "answer shorter than minimum");
  }

  private async decideSubstantive(input: FollowUpInput, transition: string): Promise<FollowUpDecision> {
    const candidates: Candidate[] = [];
    const evidenceFirst = isUnsupportedAssertion(input.answer);
    if (evidenceFirst) {
      candidates.push({ text: this.pick(this.templates.evidence, input), source: "evidence" });
    }

    if (isSparseAnswer(input.answer)) {
      if (candidates.length === 0) {
        candidates.push({ text: this.pick(this.substantivePool(input.questionType), input), source: "template" });
      }
      return this.finish(input, candidates, transition, "answer too sparse to analyse");
    }

    if (!evidenceFirst && !hasRubricGap(input.dossier)) {
      return this.finish(input, [], transition, "no rubric gap");
    }

    const unmet = unmetExpectedPoints(input.expectedPoints, input.answer);
    const result = await this.executor.run(
      followUpStage,
      {
        ...this.contextVariables(input),
        unmet_points: unmet.length > 0 ? unmet.map((point) => `- ${point}`).join("\n") : "(none)",
        evaluation_notes: this.evaluationNotes(input.dossier),
        asked_questions:
          input.askedQuestions.length > 0 ? input.askedQuestions.map((q) => `- ${q}`).join("\n") : "(none)"
      },
      input.signal
    );

    const llmFollowUps = result.success ? result.data.followups : [];
    const llmTransition = result.success && result.data.transition_phrase ? result.data.transition_phrase : transition;
    for (const text of llmFollowUps) {
      candidates.push({ text, source: "llm" });
    }

    if (llmFollowUps.length === 0 && !evidenceFirst) {
      candidates.push({ text: this.pick(this.substantivePool(input.questionType), input), source: "template" });
    }
    return this.finish(input, candidates, llmTransition, evidenceFirst ? "unsupported assertion" : "rubric gap");
  }

  private finish(
    input: FollowUpInput,
    candidates: Candidate[],
    transition: string,
    reason: string
  ): FollowUpDecision {
    const cleaned: Candidate[] = [];
    for (const candidate of candidates) {
      const fromTemplate = candidate.source !== "llm" && candidate.source !== "soft_llm";
      const sanitized = sanitizeAgainstResume(candidate.text.trim(), input.interview.resume).trim();
      const text = fromTemplate ? ensureQuestionMark(sanitized) : sanitized;
      if (text) cleaned.push({ text, source: candidate.source });
    }

    const unique = new Set(dedupPreserveOrder(cleaned.map((entry) => entry.text)));
    const kept: Candidate[] = [];
    for (const candidate of cleaned) {
      if (!unique.delete(candidate.text)) continue;
      const previous = [...input.askedQuestions, ...kept.map((entry) => entry.text)];
      if (isNearDuplicate(candidate.text, previous)) continue;
      kept.push(candidate);
    }

    const capped = kept.slice(0, MAX_FOLLOWUPS_PER_DECISION);
    const fallbackUsed = capped.some((entry) => entry.source === "template" || entry.source === "soft_template");
    if (fallbackUsed) {
      this.logger.info("[followUp] template fallback used", {
        question_type: input.questionType,
        reason
      });
    }
    return {
      followups: capped.map((entry) => entry.text),
      sources: capped.length > 0 ? capped.map((entry) => entry.source) : ["none"],
      fallback_used: fallbackUsed,
      transition_phrase: transition,
      reason
    };
  }

  private contextVariables(input: FollowUpInput): Record<string, string> {
    return {
      company_name: input.interview.company_name,
      job_title: input.interview.job_title,
      persona_description: input.persona.persona_description,
      question_style_guide: input.persona.question_style_guide,
      question_type: input.questionType,
      question: input.question,
      answer: input.answer
    };
  }

  private evaluationNotes(dossier: Dossier | null): string {
    if (!dossier) return "(no evaluation available)";
    const weakest = Object.entries(dossier.scores_main)
      .filter(([, score]) => score < RUBRIC_GAP_THRESHOLD)
      .map(([component, score]) => `${component}: ${score}/20`);
    const missing = Object.entries(dossier.extracted)
      .filter(([, value]) => value.trim() === "")
      .map(([component]) => component);
    return [
      `framework: ${dossier.framework ?? "unknown"}`,
      `weak components: ${weakest.length > 0 ? weakest.join(", ") : "(none)"}`,
      `missing components: ${missing.length > 0 ? missing.join(", ") : "(none)"}`,
      `tip: ${dossier.overall_tip || "(none)"}`
    ].join("\n");
  }

  private deficitHint(questionType: QuestionType): string {
    switch (questionType) {
      case "icebreaking":
        return "The reply is very short; a friendly check-in or reassurance works best.";
      case "self_intro":
        return "Invite one concrete strength, recent example or role keyword.";
      case "motivation":
        return "Invite one specific point about the company or role (product, culture, problem space).";
      default:
        return "";
    }
  }

  private softPool(questionType: QuestionType): string[] {
    const soft = this.templates.soft;
    if (questionType === "icebreaking") return soft.icebreaking;
    if (questionType === "self_intro") return soft.self_intro;
    if (questionType === "motivation") return soft.motivation;
    return [];
  }

  private substantivePool(questionType: QuestionType): string[] {
    const substantive = this.templates.substantive;
    return substantive[questionType] ?? substantive.competency ?? this.templates.evidence;
  }

  /** Random template not already asked, parameterized by company and role. */
  private pick(pool: readonly string[], input: FollowUpInput): string {
    const rendered = pool.map((template) =>
      renderTemplate(template, { company: input.interview.company_name, role: input.interview.job_title }, "followup_template")
    );
    const fresh = rendered.filter((question) => !isNearDuplicate(question, input.askedQuestions));
    const choices = fresh.length > 0 ? fresh : rendered;
    const index = Math.min(choices.length - 1, Math.floor(this.random() * choices.length));
    return choices[index];
  }
}
