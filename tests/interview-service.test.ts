import { describe, expect, test } from "vitest";
import { AnswerEvaluator } from "../src/services/evaluation/answerEvaluator";
import { FollowUpGenerator } from "../src/services/interviewer/followUp";
import { ProviderError, ProviderUnavailableError } from "../src/services/llm/types";
import { answeredDossiers, InterviewService } from "../src/services/orchestration/interviewService";
import { InMemorySessionRepository } from "../src/services/persistence/memoryRepository";
import { SessionNotFoundError } from "../src/services/persistence/types";
import { DEFAULT_HIRING_POLICY } from "../src/services/report/hiring";
import {
  createRecordingLogger,
  FakeLLM,
  fakeExecutor,
  FOLLOW_UP_QUESTION,
  makeDossier,
  PLAN_QUESTIONS,
  SAMPLE_ANSWER,
  sampleContext
} from "./helpers";

const NOW = new Date("2026-03-02T10:00:00.000Z");
const WARM_REPLY = "I'm doing well, thanks for having me today.";

function setup(llm = new FakeLLM()) {
  const repository = new InMemorySessionRepository(() => NOW);
  const executor = fakeExecutor(llm);
  const { logger, entries } = createRecordingLogger();
  const service = new InterviewService({
    repository,
    executor,
    evaluator: new AnswerEvaluator({ executor }),
    followUps: new FollowUpGenerator({ executor, random: () => 0 }),
    policy: DEFAULT_HIRING_POLICY,
    logger,
    newId: () => "session-1",
    now: () => NOW
  });
  return { service, repository, llm, entries };
}

describe("InterviewService", () => {
  test("starts a session on the first question of the plan", async () => {
    const { service, repository, entries } = setup();

    const started = await service.startSession(sampleContext());

    expect(started).toEqual({
      session_id: "session-1",
      label: "1",
      question: PLAN_QUESTIONS.intro,
      kind: "main",
      phase: "INTRO"
    });
    const session = await repository.get("session-1");
    expect(session?.plan_source).toBe("llm");
    expect(session?.created_at).toBe(NOW.toISOString());
    expect((await repository.listTurns("session-1")).map((turn) => [turn.role, turn.label, turn.text])).toEqual([
      ["interviewer", "1", PLAN_QUESTIONS.intro]
    ]);
    expect(entries).toContainEqual({
      level: "info",
      message: "[interview] session started",
      meta: { session_id: "session-1", plan_source: "llm", questions: 3 }
    });
  });

  test("a clarification request repeats the question without advancing", async () => {
    const llm = new FakeLLM().respond("intent", '{"intent": "CLARIFICATION_REQUEST", "reason": "asked to rephrase"}');
    const { service, repository } = setup(llm);
    await service.startSession(sampleContext());

    const result = await service.submitAnswer("session-1", "Sorry, what do you mean?");

    expect(result).toEqual({
      status: "recovered",
      label: "1",
      intent: "CLARIFICATION_REQUEST",
      message: "Of course, let me put it more simply. How are you today?",
      next_action: "answer_again"
    });
    expect((await repository.get("session-1"))?.flow.current?.label).toBe("1");
    const turns = await repository.listTurns("session-1");
    expect(turns.map((turn) => [turn.role, turn.label, turn.intent, turn.dossier])).toEqual([
      ["interviewer", "1", null, null],
      ["candidate", "1", "CLARIFICATION_REQUEST", null],
      ["interviewer", "1", null, null]
    ]);
    expect(turns[2].text).toBe("Of course, let me put it more simply. How are you today?");
  });

  test("queues model follow-ups after a weak core answer", async () => {
    const llm = new FakeLLM().respond(
      "scoring",
      JSON.stringify({
        scores_main: { situation: 10, task: 10, action: 10, result: 10 },
        scores_ext: { metrics: 5 },
        scoring_reason: "Thin on detail."
      })
    );
    const { service } = setup(llm);
    await service.startSession(sampleContext());

    const warmUp = await service.submitAnswer("session-1", WARM_REPLY);
    expect(warmUp).toMatchObject({
      status: "evaluated",
      label: "1",
      followups_queued: 0,
      next_question_hint: { label: "2", question: PLAN_QUESTIONS.core }
    });

    expect(await service.nextQuestion("session-1")).toEqual({
      done: false,
      label: "2",
      question: PLAN_QUESTIONS.core,
      kind: "main",
      phase: "CORE"
    });

    const result = await service.submitAnswer("session-1", SAMPLE_ANSWER);
    expect(result).toMatchObject({
      status: "evaluated",
      label: "2",
      transition_phrase: "Thanks, that helps.",
      followups_queued: 1,
      followup_fallback_used: false,
      next_question_hint: { label: "2-1", question: FOLLOW_UP_QUESTION }
    });

    expect(await service.nextQuestion("session-1")).toEqual({
      done: false,
      label: "2-1",
      question: FOLLOW_UP_QUESTION,
      kind: "followup",
      phase: "CORE"
    });
  });

  test("reports an answer that could not be evaluated", async () => {
    const llm = new FakeLLM().respond("intent", new ProviderError("HTTP 401: invalid key", false));
    const { service, repository, entries } = setup(llm);
    await service.startSession(sampleContext());

    const result = await service.submitAnswer("session-1", WARM_REPLY);

    expect(result).toEqual({
      status: "evaluation_failed",
      label: "1",
      error: "HTTP 401: invalid key",
      failed_stages: ["intent"]
    });
    const turns = await repository.listTurns("session-1");
    expect(turns[1]).toMatchObject({ role: "candidate", text: WARM_REPLY, intent: null, dossier: null });
    expect(entries.map((entry) => entry.message)).toContain("[interview] answer could not be evaluated");
  });

  test("does not create a session when the provider is down at planning", async () => {
    const llm = new FakeLLM().respond(
      "plan",
      new ProviderError("HTTP 503: down", true),
      new ProviderError("HTTP 503: down", true)
    );
    const { service, repository } = setup(llm);

    await expect(service.startSession(sampleContext())).rejects.toThrow(ProviderUnavailableError);
    expect(await repository.get("session-1")).toBeNull();
  });

  test("finishes once the plan is exhausted", async () => {
    const { service, repository } = setup();
    await service.startSession(sampleContext());

    expect(await service.nextQuestion("session-1")).toMatchObject({ done: false, label: "2" });
    expect(await service.nextQuestion("session-1")).toMatchObject({ done: false, label: "3", phase: "WRAPUP" });
    expect(await service.nextQuestion("session-1")).toEqual({ done: true });
    expect((await repository.get("session-1"))?.status).toBe("finished");
    expect(await service.nextQuestion("session-1")).toEqual({ done: true });
  });

  test("finish builds the report once and caches it", async () => {
    const { service, repository, llm } = setup();
    await service.startSession(sampleContext());
    await service.submitAnswer("session-1", WARM_REPLY);

    const report = await service.finishSession("session-1");

    expect(report.session_id).toBe("session-1");
    expect(report.narrative_source).toBe("llm");
    expect(report.overall_summary).toBe("A focused candidate with a measured, well-structured story.");
    expect(report.score_aggregation.counted_dossiers).toBe(0);
    expect(report.score_aggregation.excluded_dossiers).toBe(1);
    expect(report.hiring_recommendation).toBe("no_hire");
    expect(report.created_at).toBe(NOW.toISOString());
    expect((await repository.get("session-1"))?.status).toBe("finished");

    expect(await service.finishSession("session-1")).toEqual(report);
    expect(await service.getReport("session-1")).toEqual(report);
    expect(llm.callsFor("report_narrative")).toHaveLength(1);
    expect(llm.callsFor("resume_feedback")).toHaveLength(1);
    expect(report.resume_feedback).toEqual({
      job_fit_assessment: "High: five years of backend work matches the payment API role.",
      strengths_and_opportunities: "The latency result is quantified; lead with it.",
      gaps_and_improvements: "Payments experience is not mentioned; add the systems you operated.",
      source: "llm"
    });
  });

  test("a finished session takes no more answers", async () => {
    const { service } = setup();
    await service.startSession(sampleContext());
    await service.finishSession("session-1");

    expect(await service.submitAnswer("session-1", WARM_REPLY)).toEqual({ status: "done" });
    expect(await service.nextQuestion("session-1")).toEqual({ done: true });
  });

  test("unknown sessions are rejected", async () => {
    const { service } = setup();

    await expect(service.submitAnswer("missing", WARM_REPLY)).rejects.toThrow(SessionNotFoundError);
    await expect(service.nextQuestion("missing")).rejects.toThrow(SessionNotFoundError);
    await expect(service.getReport("missing")).rejects.toThrow("Session not found: missing");
  });

  test("the report is missing until the session is finished", async () => {
    const { service } = setup();
    await service.startSession(sampleContext());
    expect(await service.getReport("session-1")).toBeNull();
  });
});

describe("answeredDossiers", () => {
  test("keeps the latest dossier per label", () => {
    const older = makeDossier({ question_label: "2", overall_tip: "older" });
    const newer = makeDossier({ question_label: "2", overall_tip: "newer" });
    const base = { question_type: "star" as const, intent: "ANSWER" as const, created_at: NOW.toISOString() };

    const dossiers = answeredDossiers([
      { ...base, seq: 1, role: "interviewer", label: "2", text: "Q", intent: null, dossier: null },
      { ...base, seq: 2, role: "candidate", label: "2", text: "A", dossier: older },
      { ...base, seq: 3, role: "candidate", label: "2", text: "B", dossier: newer }
    ]);

    expect(dossiers.map((dossier) => dossier.overall_tip)).toEqual(["newer"]);
  });
});
