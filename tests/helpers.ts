/**
 * Shared fakes and fixtures. The fake model routes each prompt to a stage by a
 * phrase its template contains and answers with a scripted or default JSON body.
 */

import type { Logger, LogLevel } from "../src/config/logger";
import { PromptChainExecutor } from "../src/services/chain/executor";
import type { Dossier } from "../src/services/evaluation/types";
import type { RetryOptions } from "../src/services/llm/retry";
import type { LLMClient } from "../src/services/llm/types";
import type { InterviewContext, Persona, Plan } from "../src/services/orchestration/types";
import type { QueryResultLike, Queryable } from "../src/services/persistence/pgRepository";

export type FakeStage =
  | "correction"
  | "intent"
  | "framework"
  | "extraction"
  | "scoring"
  | "explanation"
  | "coaching"
  | "model_answer"
  | "bias_filter"
  | "soft_followup"
  | "followup"
  | "plan"
  | "report_narrative"
  | "resume_feedback";

// The correction prompt embeds the original request, so it is matched first.
const STAGE_MARKERS: Array<[FakeStage, string]> = [
  ["correction", "Your previous response could not be parsed"],
  ["intent", "Classify the candidate's reply"],
  ["framework", "Identify which answer-structuring framework"],
  ["extraction", "Summarize the candidate's answer along"],
  ["scoring", "Score the answer using the"],
  ["explanation", "Explain each score of a"],
  ["coaching", "Coach the candidate on this answer."],
  ["model_answer", "Write one improved model answer"],
  ["bias_filter", "Review generated interview feedback for bias"],
  ["soft_followup", "You are a warm interviewer"],
  ["followup", "Write up to 2 follow-up questions"],
  ["plan", "You are designing a structured interview"],
  ["report_narrative", "You are the head interviewer writing the final interview report"],
  ["resume_feedback", "You are a recruiter and career coach reviewing a resume"]
];

export function stageOf(prompt: string): FakeStage {
  const match = STAGE_MARKERS.find(([, marker]) => prompt.includes(marker));
  if (!match) throw new Error(`Fake model received an unrecognized prompt: ${prompt.slice(0, 80)}`);
  return match[0];
}

// --- Fixtures ---

export const SAMPLE_ANSWER =
  "In my last role our checkout service kept timing out during sales. I was asked to fix it before the holiday launch. " +
  "I profiled the database calls and added a cache in front of the pricing lookups. " +
  "Checkout latency dropped by 40 percent and we had no outages that season.";

export const SAMPLE_STRENGTHS = [
  '"added a cache in front of the pricing lookups" - clear ownership of the technical fix',
  '"dropped by 40 percent" - quantified result'
];

export const SAMPLE_IMPROVEMENTS = ['"I was asked to fix it" - explain how you decided what to measure first'];

export const MODEL_ANSWER_TEXT =
  "During a seasonal sale our checkout service kept timing out. I owned the fix: I profiled the database calls, " +
  "found the pricing lookups were the bottleneck and put a cache in front of them. Latency dropped by 40 percent " +
  "and we had no outages that season.";

export const FOLLOW_UP_QUESTION = "Which metric told you the cache was working?";

export const PLAN_QUESTIONS = {
  intro: "How are you today?",
  core: "Tell me about a time you fixed a slow service.",
  wrapup: "Any questions for us?"
};

export const DEFAULT_RESPONSES: Record<FakeStage, string> = {
  correction: "still not json",
  intent: JSON.stringify({ intent: "ANSWER", reason: "The reply addresses the question." }),
  framework: JSON.stringify({ frameworks: ["STAR+M"], rationale: "Situation, actions and a measured result." }),
  extraction: JSON.stringify({
    extracted: {
      situation: "Checkout service timed out during sales.",
      task: "Fix it before the holiday launch.",
      action: "Profiled database calls and added a cache.",
      result: "Latency dropped by 40 percent, no outages."
    }
  }),
  scoring: JSON.stringify({
    scores_main: { situation: 16, task: 16, action: 16, result: 16 },
    scores_ext: { metrics: 8 },
    scoring_reason: "A complete STAR story with a quantified result."
  }),
  explanation: JSON.stringify({
    calibration: [
      {
        element: "task",
        given: 16,
        max: 20,
        gap: 4,
        why_not_max: "The goal was stated but not its stakes.",
        how_to_improve: ["State the deadline", "Name who depended on it", "Give the cost of failure", "Extra"]
      }
    ],
    ext_calibration: [],
    overall_tip: "Lead with the stakes, then the outcome."
  }),
  coaching: JSON.stringify({
    strengths: SAMPLE_STRENGTHS,
    improvements: [...SAMPLE_IMPROVEMENTS, "Talk more about the team."],
    feedback: "A clear story with a measured outcome."
  }),
  model_answer: JSON.stringify({
    model_answer: MODEL_ANSWER_TEXT,
    model_answer_framework: "star",
    selection_reason: "Situation, action and result map directly."
  }),
  bias_filter: JSON.stringify({
    flagged: false,
    issues: [],
    sanitized: { strengths: [], improvements: [], feedback: "", model_answer: "" }
  }),
  soft_followup: JSON.stringify({ follow_up_question: "What part of your day has gone best so far?" }),
  followup: JSON.stringify({
    followups: [FOLLOW_UP_QUESTION],
    rationale: "The result was not tied to a metric.",
    transition_phrase: "Thanks, that helps."
  }),
  plan: JSON.stringify({
    phases: [
      { key: "intro", items: [{ type: "icebreaking", question: PLAN_QUESTIONS.intro, expected_points: [] }] },
      {
        key: "core",
        items: [
          {
            type: "star",
            question: PLAN_QUESTIONS.core,
            expected_points: ["situation and stakes", "own actions", "measured result"]
          }
        ]
      },
      { key: "wrapup", items: [{ type: "wrapup", question: PLAN_QUESTIONS.wrapup, expected_points: [] }] }
    ]
  }),
  report_narrative: JSON.stringify({
    overall_summary: "A focused candidate with a measured, well-structured story.",
    interview_flow_rationale: "A short warm-up, one behavioural question and a closing question.",
    missed_opportunities: ["Stakeholder communication was not discussed."],
    next_actions: ["Prepare an example about working with stakeholders."]
  }),
  resume_feedback: JSON.stringify({
    job_fit_assessment: "High: five years of backend work matches the payment API role.",
    strengths_and_opportunities: "The latency result is quantified; lead with it.",
    gaps_and_improvements: "Payments experience is not mentioned; add the systems you operated."
  })
};

// --- Fake model ---

export type FakeCall = { stage: FakeStage; prompt: string; temperature: number; maxTokens: number };

export class FakeLLM implements LLMClient {
  readonly calls: FakeCall[] = [];
  private readonly scripted = new Map<FakeStage, Array<string | Error>>();

  /** Queue responses for a stage; once used up the stage falls back to its default. */
  respond(stage: FakeStage, ...responses: Array<string | Error>): this {
    const queue = this.scripted.get(stage) ?? [];
    queue.push(...responses);
    this.scripted.set(stage, queue);
    return this;
  }

  callsFor(stage: FakeStage): FakeCall[] {
    return this.calls.filter((call) => call.stage === stage);
  }

  async call(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    const stage = stageOf(prompt);
    this.calls.push({ stage, prompt, temperature, maxTokens });
    const next = this.scripted.get(stage)?.shift() ?? DEFAULT_RESPONSES[stage];
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Answers in the order given, whatever the prompt. */
export class ScriptedLLM implements LLMClient {
  readonly prompts: string[] = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async call(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.responses.shift();
    if (next === undefined) throw new Error("No scripted response left");
    if (next instanceof Error) throw next;
    return next;
  }
}

export const FAST_RETRY: RetryOptions = {
  maxAttempts: 2,
  baseDelayMs: 0,
  timeoutMs: 1000,
  sleep: async () => undefined
};

export function fakeExecutor(llm: LLMClient): PromptChainExecutor {
  return new PromptChainExecutor(llm, { retry: FAST_RETRY });
}

// --- Logging ---

export type LogEntry = { level: LogLevel; message: string; meta?: Record<string, unknown> };

export function createRecordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      entries.push({ level, message, meta });
    };
  return {
    logger: { debug: record("debug"), info: record("info"), warn: record("warn"), error: record("error") },
    entries
  };
}

// --- Domain fixtures ---

export function sampleContext(overrides: Partial<InterviewContext> = {}): InterviewContext {
  return {
    company_name: "Northwind",
    job_title: "Backend Engineer",
    job_description: "Build and operate payment APIs.",
    resume: "Backend engineer with five years of experience. Cut API latency by 30% at Contoso.",
    competency_hints: ["Owns production incidents end to end", "Designs for scale and observability"],
    language: "en",
    difficulty: "normal",
    persona: "team_lead",
    ...overrides
  };
}

export const SAMPLE_PERSONA: Persona = {
  key: "team_lead",
  persona_description: "A hands-on team lead.",
  evaluation_focus: "Ownership and technical judgement.",
  question_style_guide: "Ask about specific situations."
};

/** Intro (2 items), core (3 items), wrapup (1 item): labels 1 to 6. */
export function samplePlan(): Plan {
  const rubric = [{ score: 5, descriptor: "Complete" }];
  return {
    phases: [
      {
        key: "intro",
        items: [
          { id: "intro-1", type: "icebreaking", question: "How are you today?", expected_points: [], rubric },
          { id: "intro-2", type: "self_intro", question: "Please introduce yourself.", expected_points: [], rubric }
        ]
      },
      {
        key: "core",
        items: [
          { id: "core-1", type: "star", question: "Tell me about a hard problem you solved.", expected_points: [], rubric },
          { id: "core-2", type: "competency", question: "How do you handle disagreement?", expected_points: [], rubric },
          { id: "core-3", type: "case", question: "How would you size this market?", expected_points: [], rubric }
        ]
      },
      {
        key: "wrapup",
        items: [{ id: "wrapup-1", type: "wrapup", question: "Any questions for us?", expected_points: [], rubric }]
      }
    ]
  };
}

export function makeDossier(overrides: Partial<Dossier> = {}): Dossier {
  return {
    question_label: "2",
    question_type: "star",
    intent: "ANSWER",
    framework: "STAR",
    extensions: ["metrics"],
    extracted: {
      situation: "Checkout service timed out during sales.",
      task: "Fix it before the holiday launch.",
      action: "Profiled database calls and added a cache.",
      result: "Latency dropped by 40 percent, no outages."
    },
    scores_main: { situation: 16, task: 16, action: 16, result: 16 },
    scores_ext: { metrics: 8 },
    scoring_reason: "A complete STAR story with a quantified result.",
    calibration: [],
    ext_calibration: [],
    overall_tip: "Lead with the stakes, then the outcome.",
    feedback: "A clear story with a measured outcome.",
    strengths: [...SAMPLE_STRENGTHS],
    improvements: [...SAMPLE_IMPROVEMENTS],
    model_answer: { text: MODEL_ANSWER_TEXT, framework: "STAR", selection_reason: "Maps directly." },
    bias: { flagged: false, issues: [] },
    excluded: false,
    failed_stages: [],
    skipped_stages: [],
    ...overrides
  };
}

// --- Database stand-in ---

export type RecordedQuery = { text: string; values: unknown[] };

/** Records every query and answers with queued results (empty by default). */
export class FakeQueryable implements Queryable {
  readonly queries: RecordedQuery[] = [];
  private readonly results: QueryResultLike[] = [];

  enqueue(...results: QueryResultLike[]): this {
    this.results.push(...results);
    return this;
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResultLike> {
    this.queries.push({ text, values });
    return this.results.shift() ?? { rows: [], rowCount: 0 };
  }
}

export function flushAsync(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}
