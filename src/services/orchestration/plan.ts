/**
 * Interview plan: normalization of model-designed plans and the question-bank
 * fallback used when the model returns nothing usable.
 */

import { z } from "zod";
import type { Logger } from "../../config/logger";
import { createNoopLogger } from "../../config/logger";
import { loadDataFile } from "../../utils/dataFile";
import { ensureQuestionMark, firstSentence } from "../../utils/text";
import type { PromptChainExecutor } from "../chain/executor";
import { isJsonObject, type JsonObject } from "../chain/jsonRepair";
import { renderTemplate } from "../chain/template";
import { ProviderUnavailableError } from "../llm/types";
import { planStage } from "./stages";
import {
  PHASE_KEYS,
  QUESTION_TYPES,
  type Difficulty,
  type InterviewContext,
  type PhaseKey,
  type Persona,
  type Plan,
  type PlanItem,
  type QuestionType,
  type RubricBand
} from "./types";

const MAX_QUESTION_CHARS = 260;

export const DEFAULT_RUBRIC: RubricBand[] = [
  { score: 5, descriptor: "Complete, specific and well-evidenced answer covering every expected point." },
  { score: 3, descriptor: "Relevant answer that covers some expected points with limited evidence." },
  { score: 1, descriptor: "Vague or off-topic answer with no supporting example." }
];

const DIFFICULTY_INSTRUCTIONS: Record<Difficulty, string> = {
  easy: "Friendly and encouraging. Ask about experience the candidate has clearly had; avoid trick questions.",
  normal: "Balanced. Probe for concrete examples and reasoning behind decisions.",
  hard: "Demanding. Challenge assumptions, ask about failures and trade-offs, expect quantified results."
};

const CORE_COUNT: Record<Difficulty, number> = { easy: 2, normal: 3, hard: 4 };

// --- Aliases ---

const PHASE_ALIASES: Record<string, PhaseKey> = {
  intro: "intro",
  introduction: "intro",
  opening: "intro",
  icebreaking: "intro",
  core: "core",
  main: "core",
  body: "core",
  technical: "core",
  behavioral: "core",
  wrapup: "wrapup",
  wrap_up: "wrapup",
  closing: "wrapup",
  close: "wrapup",
  end: "wrapup"
};

const TYPE_ALIASES: Record<string, QuestionType> = {
  icebreak: "icebreaking",
  icebreaker: "icebreaking",
  ice_breaking: "icebreaking",
  intro_self: "self_intro",
  self_introduction: "self_intro",
  selfintro: "self_intro",
  introduction: "self_intro",
  intro_motivation: "motivation",
  why_company: "motivation",
  behavioral: "star",
  behavioural: "star",
  experience: "star",
  case_study: "case",
  system_design: "system",
  systemdesign: "system",
  design: "system",
  pressure: "hard",
  stress: "hard",
  wrap_up: "wrapup",
  closing: "wrapup"
};

const PHASE_DEFAULT_TYPE: Record<PhaseKey, QuestionType> = {
  intro: "self_intro",
  core: "competency",
  wrapup: "wrapup"
};

function aliasKey(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[\s:\-/]+/g, "_");
}

export function normalizePhaseKey(value: unknown): PhaseKey | null {
  if (typeof value !== "string") return null;
  return PHASE_ALIASES[aliasKey(value)] ?? null;
}

export function normalizeQuestionType(value: unknown, phase: PhaseKey): QuestionType {
  if (typeof value !== "string") return PHASE_DEFAULT_TYPE[phase];
  const key = aliasKey(value);
  const direct = QUESTION_TYPES.find((type) => type === key && type !== "unknown");
  return direct ?? TYPE_ALIASES[key] ?? PHASE_DEFAULT_TYPE[phase];
}

function cleanQuestion(value: string): string {
  const trimmed = value.replace(/\s+/g, " ").trim();
  const shortened = trimmed.length > MAX_QUESTION_CHARS ? firstSentence(trimmed).slice(0, MAX_QUESTION_CHARS) : trimmed;
  return ensureQuestionMark(shortened);
}

function stringList(value: unknown): string[] {
  if (typeof value === "string") return value.trim() ? [value.trim()] : [];
  if (!Array.isArray(value)) return [];
  return value
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function rubricBands(value: unknown): RubricBand[] {
  if (!Array.isArray(value)) return [];
  const bands: RubricBand[] = [];
  for (const entry of value) {
    if (!isJsonObject(entry)) continue;
    const score = typeof entry.score === "number" ? entry.score : Number.parseFloat(String(entry.score));
    const descriptor = typeof entry.descriptor === "string" ? entry.descriptor.trim() : "";
    if (Number.isFinite(score) && descriptor) bands.push({ score, descriptor });
  }
  return bands.sort((a, b) => b.score - a.score);
}

type DraftItem = Omit<PlanItem, "id"> & { id: string | null };

function normalizeItem(raw: unknown, phase: PhaseKey): DraftItem | null {
  if (typeof raw === "string") {
    const question = cleanQuestion(raw);
    return question
      ? { id: null, type: PHASE_DEFAULT_TYPE[phase], question, expected_points: [], rubric: [] }
      : null;
  }
  if (!isJsonObject(raw)) return null;
  const rawQuestion = raw.question ?? raw.text ?? raw.q;
  if (typeof rawQuestion !== "string") return null;
  const question = cleanQuestion(rawQuestion);
  if (!question) return null;
  return {
    id: typeof raw.id === "string" && raw.id.trim() ? raw.id.trim() : null,
    type: normalizeQuestionType(raw.type ?? raw.question_type, phase),
    question,
    expected_points: stringList(raw.expected_points ?? raw.expectedPoints ?? raw.points),
    rubric: rubricBands(raw.rubric)
  };
}

function rawPhaseEntries(raw: JsonObject): Array<{ key: unknown; items: unknown }> {
  const container = raw.phases ?? raw.plan ?? raw.interview_plan;
  if (Array.isArray(container)) {
    return container.filter(isJsonObject).map((phase) => ({
      key: phase.key ?? phase.phase ?? phase.stage ?? phase.name,
      items: phase.items ?? phase.questions ?? phase.question
    }));
  }
  const source = isJsonObject(container) ? container : raw;
  return Object.entries(source)
    .filter(([key]) => normalizePhaseKey(key) !== null)
    .map(([key, value]) => ({
      key,
      items: isJsonObject(value) ? (value.items ?? value.questions) : value
    }));
}

/**
 * Turn a loosely shaped plan object into a Plan. Phases are merged by key and
 * ordered intro, core, wrapup; items without a question are dropped; ids are
 * unique within the plan.
 */
export function normalizePlan(raw: unknown): Plan {
  const grouped: Record<PhaseKey, DraftItem[]> = { intro: [], core: [], wrapup: [] };
  if (isJsonObject(raw)) {
    for (const entry of rawPhaseEntries(raw)) {
      const key = normalizePhaseKey(entry.key) ?? "core";
      const items = Array.isArray(entry.items) ? entry.items : entry.items === undefined ? [] : [entry.items];
      for (const item of items) {
        const normalized = normalizeItem(item, key);
        if (normalized) grouped[key].push(normalized);
      }
    }
  }

  const usedIds = new Set<string>();
  const phases = PHASE_KEYS.map((key) => ({
    key,
    items: grouped[key].map((item, index): PlanItem => {
      let id = item.id ?? `${key}-${index + 1}`;
      if (usedIds.has(id)) id = `${key}-${index + 1}-${usedIds.size}`;
      usedIds.add(id);
      return { ...item, id, rubric: item.rubric.length > 0 ? item.rubric : DEFAULT_RUBRIC };
    })
  }));
  return { phases: phases.filter((phase) => phase.items.length > 0) };
}

export function planItemCount(plan: Plan): number {
  return plan.phases.reduce((sum, phase) => sum + phase.items.length, 0);
}

// --- Fallback ---

const bankItemSchema = z.object({
  type: z.enum(QUESTION_TYPES),
  question: z.string().min(1),
  expected_points: z.array(z.string())
});

const bankPhasesSchema = z.object({
  intro: z.array(bankItemSchema),
  core: z.array(bankItemSchema),
  wrapup: z.array(bankItemSchema)
});

const questionBankSchema = z.object({
  easy: bankPhasesSchema,
  normal: bankPhasesSchema,
  hard: bankPhasesSchema
});

/** Deterministic plan from the question bank, filled with the company and role. */
export function fallbackPlan(context: InterviewContext): Plan {
  const bank = loadDataFile("questionBank.json", questionBankSchema)[context.difficulty];
  const fill = (value: string): string =>
    renderTemplate(value, { company: context.company_name, role: context.job_title }, "question_bank");
  return normalizePlan({
    phases: PHASE_KEYS.map((key) => ({
      key,
      items: bank[key].map((item) => ({
        type: item.type,
        question: fill(item.question),
        expected_points: item.expected_points.map(fill)
      }))
    }))
  });
}

// --- Planning ---

export type PlanSource = "llm" | "fallback";

export type BuildPlanDeps = {
  executor: PromptChainExecutor;
  logger?: Logger;
};

/**
 * Ask the model for a tailored plan. Malformed or empty output falls back to
 * the question bank; a provider that stays unavailable is a hard failure.
 */
export async function buildPlan(
  context: InterviewContext,
  persona: Persona,
  deps: BuildPlanDeps
): Promise<{ plan: Plan; source: PlanSource }> {
  const logger = deps.logger ?? createNoopLogger();
  const result = await deps.executor.run(planStage, {
    company_name: context.company_name,
    job_title: context.job_title,
    persona_description: persona.persona_description,
    question_style_guide: persona.question_style_guide,
    difficulty_instruction: DIFFICULTY_INSTRUCTIONS[context.difficulty],
    language: context.language,
    job_description: context.job_description || "(not provided)",
    resume: context.resume || "(not provided)",
    competency_hints:
      context.competency_hints.length > 0 ? context.competency_hints.map((hint) => `- ${hint}`).join("\n") : "(none)",
    core_count: CORE_COUNT[context.difficulty]
  });

  if (!result.success && result.kind !== "malformed") {
    throw new ProviderUnavailableError("plan", result.error);
  }

  if (result.success) {
    const plan = normalizePlan(result.data);
    if (planItemCount(plan) > 0) {
      return { plan, source: "llm" };
    }
  }

  logger.warn("[plan] model plan unusable, using question bank", {
    difficulty: context.difficulty,
    error: result.success ? "empty plan" : result.error
  });
  return { plan: fallbackPlan(context), source: "fallback" };
}
