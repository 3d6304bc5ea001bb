/**
 * The engine's external operations: start a session, submit an answer, serve
 * the next question, finish with a report. Calls for one session are
 * serialized; different sessions run concurrently.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "../../config/logger";
import { createNoopLogger } from "../../config/logger";
import type { PromptChainExecutor } from "../chain/executor";
import type { AnswerEvaluator } from "../evaluation/answerEvaluator";
import { isEvaluationError, type Dossier, type EvaluationStage } from "../evaluation/types";
import type { FollowUpGenerator } from "../interviewer/followUp";
import { recoveryPrompt, type RecoverableIntent, type RecoveryAction } from "../interviewer/recovery";
import type { SessionRepository } from "../persistence/types";
import { SessionNotFoundError } from "../persistence/types";
import { buildReport } from "../report/assembler";
import type { HiringPolicy } from "../report/hiring";
import { generateNarrative } from "../report/narrative";
import { generateResumeFeedback } from "../report/resumeFeedback";
import type { ThemeClassifier } from "../report/themes";
import type { Report } from "../report/types";
import { StaticContextRetriever, type ContextRetriever } from "../retrieval/contextRetriever";
import {
  enqueueFollowUps,
  finishFlow,
  flowPhase,
  initialFlowState,
  nextQuestion,
  peekNextQuestion
} from "./flowController";
import { loadPersona } from "./personas";
import { buildPlan } from "./plan";
import { KeyedLock } from "./sessionLock";
import type { FlowPhase, InterviewContext, PlanItem, ServedQuestion, Session, Turn } from "./types";

export type QuestionView = {
  label: string;
  question: string;
  kind: ServedQuestion["kind"];
  phase: FlowPhase;
};

export type StartSessionResult = QuestionView & { session_id: string };

export type SubmitAnswerResult =
  | { status: "done" }
  | {
      status: "recovered";
      label: string;
      intent: RecoverableIntent;
      message: string;
      next_action: RecoveryAction;
    }
  | {
      status: "evaluated";
      label: string;
      dossier: Dossier;
      transition_phrase: string;
      followups_queued: number;
      followup_fallback_used: boolean;
      next_question_hint: { label: string; question: string } | null;
    }
  | {
      status: "evaluation_failed";
      label: string;
      error: string;
      failed_stages: EvaluationStage[];
    };

export type NextQuestionView = ({ done: false } & QuestionView) | { done: true };

export type InterviewServiceDeps = {
  repository: SessionRepository;
  executor: PromptChainExecutor;
  evaluator: AnswerEvaluator;
  followUps: FollowUpGenerator;
  policy: HiringPolicy;
  classifier?: ThemeClassifier;
  logger?: Logger;
  /** Competency lookup for a session; defaults to ranking the session's own hints. */
  retrieverFor?: (context: InterviewContext) => ContextRetriever;
  newId?: () => string;
  now?: () => Date;
};

export class InterviewService {
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;
  private readonly retrieverFor: (context: InterviewContext) => ContextRetriever;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(private readonly deps: InterviewServiceDeps) {
    this.logger = deps.logger ?? createNoopLogger();
    this.retrieverFor = deps.retrieverFor ?? ((context) => new StaticContextRetriever(context.competency_hints));
    this.newId = deps.newId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  async startSession(context: InterviewContext): Promise<StartSessionResult> {
    const persona = loadPersona(context.persona);
    const { plan, source } = await buildPlan(context, persona, {
      executor: this.deps.executor,
      logger: this.logger
    });

    const step = nextQuestion(plan, initialFlowState());
    if (step.result.done) {
      throw new Error("Interview plan has no questions");
    }
    const createdAt = this.now().toISOString();
    const session: Session = {
      id: this.newId(),
      context,
      plan,
      flow: step.state,
      status: "active",
      plan_source: source,
      created_at: createdAt,
      updated_at: createdAt
    };
    await this.deps.repository.create(session);
    const served = step.result.question;
    await this.recordQuestion(session.id, served);

    this.logger.info("[interview] session started", {
      session_id: session.id,
      plan_source: source,
      questions: plan.phases.reduce((sum, phase) => sum + phase.items.length, 0)
    });
    return { session_id: session.id, ...this.view(served, flowPhase(plan, step.state)) };
  }

  submitAnswer(sessionId: string, answer: string, question?: string): Promise<SubmitAnswerResult> {
    return this.lock.run<SubmitAnswerResult>(sessionId, async () => {
      const session = await this.load(sessionId);
      const current = session.flow.current;
      if (session.status === "finished" || session.flow.done || !current) {
        return { status: "done" };
      }

      const questionText = question?.trim() || current.question;
      const item = this.planItem(session, current.item_id);
      const persona = loadPersona(session.context.persona);
      const evaluation = await this.deps.evaluator.evaluate(questionText, answer, {
        label: current.label,
        questionType: current.question_type,
        interview: session.context,
        persona,
        expectedPoints: item?.expected_points ?? [],
        retriever: this.retrieverFor(session.context)
      });

      if (isEvaluationError(evaluation)) {
        await this.recordAnswer(sessionId, current, answer, null);
        this.logger.error("[interview] answer could not be evaluated", {
          session_id: sessionId,
          label: current.label,
          error: evaluation.error
        });
        return {
          status: "evaluation_failed",
          label: current.label,
          error: evaluation.error,
          failed_stages: evaluation.failed_stages.map((failure) => failure.stage)
        };
      }

      if (evaluation.intent !== "ANSWER") {
        const recovery = recoveryPrompt(evaluation.intent, current.question);
        await this.recordAnswer(sessionId, current, answer, evaluation);
        await this.deps.repository.appendTurn(sessionId, {
          role: "interviewer",
          label: current.label,
          text: recovery.message,
          question_type: current.question_type,
          intent: null,
          dossier: null
        });
        return {
          status: "recovered",
          label: current.label,
          intent: recovery.intent,
          message: recovery.message,
          next_action: recovery.next_action
        };
      }

      const turns = await this.deps.repository.listTurns(sessionId);
      const decision = await this.deps.followUps.decide({
        questionType: current.question_type,
        question: questionText,
        answer,
        dossier: evaluation,
        expectedPoints: item?.expected_points ?? [],
        interview: session.context,
        persona,
        askedQuestions: [
          ...turns.filter((turn) => turn.role === "interviewer").map((turn) => turn.text),
          ...session.flow.pending_followups
        ]
      });

      const flow = enqueueFollowUps(session.flow, decision.followups);
      const queued = flow.pending_followups.length - session.flow.pending_followups.length;
      if (queued > 0) {
        await this.deps.repository.save({ ...session, flow });
      }
      await this.recordAnswer(sessionId, current, answer, evaluation);

      const hint = peekNextQuestion(session.plan, flow);
      return {
        status: "evaluated",
        label: current.label,
        dossier: evaluation,
        transition_phrase: decision.transition_phrase,
        followups_queued: queued,
        followup_fallback_used: decision.fallback_used,
        next_question_hint: hint.done ? null : { label: hint.question.label, question: hint.question.question }
      };
    });
  }

  nextQuestion(sessionId: string): Promise<NextQuestionView> {
    return this.lock.run<NextQuestionView>(sessionId, async () => {
      const session = await this.load(sessionId);
      if (session.status === "finished") return { done: true };

      const step = nextQuestion(session.plan, session.flow);
      if (step.result.done) {
        await this.deps.repository.save({ ...session, flow: step.state, status: "finished" });
        this.logger.info("[interview] all questions served", { session_id: sessionId });
        return { done: true };
      }
      await this.deps.repository.save({ ...session, flow: step.state });
      await this.recordQuestion(sessionId, step.result.question);
      return { done: false, ...this.view(step.result.question, flowPhase(session.plan, step.state)) };
    });
  }

  /** Finish the interview and build its report; later calls return the cached report. */
  finishSession(sessionId: string): Promise<Report> {
    return this.lock.run<Report>(sessionId, async () => {
      const session = await this.load(sessionId);
      const cached = await this.deps.repository.getReport(sessionId);
      if (cached) return cached;

      if (session.status !== "finished") {
        await this.deps.repository.save({ ...session, flow: finishFlow(session.flow), status: "finished" });
      }

      const turns = await this.deps.repository.listTurns(sessionId);
      const dossiers = answeredDossiers(turns);
      const now = this.now();
      const resumeFeedback = await generateResumeFeedback(session.context, {
        executor: this.deps.executor,
        logger: this.logger,
        sessionId
      });
      const options = { policy: this.deps.policy, classifier: this.deps.classifier, resumeFeedback, now };
      const reportSession = { id: sessionId, turns, documents: session.context };

      const draft = buildReport(reportSession, dossiers, null, options);
      const { narrative, source } = await generateNarrative(
        draft,
        dossiers,
        session.context,
        loadPersona(session.context.persona),
        { executor: this.deps.executor, logger: this.logger }
      );
      const report =
        source === "llm" ? buildReport(reportSession, dossiers, narrative, { ...options, narrativeSource: source }) : draft;

      if (report.validation_errors.length > 0) {
        this.logger.warn("[report] validation errors", {
          session_id: sessionId,
          errors: report.validation_errors
        });
      }
      await this.deps.repository.saveReport(sessionId, report);
      this.logger.info("[interview] report built", {
        session_id: sessionId,
        recommendation: report.hiring_recommendation,
        weighted_score: report.weighted_score
      });
      return report;
    });
  }

  async getReport(sessionId: string): Promise<Report | null> {
    await this.load(sessionId);
    return this.deps.repository.getReport(sessionId);
  }

  private async load(sessionId: string): Promise<Session> {
    const session = await this.deps.repository.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private planItem(session: Session, itemId: string): PlanItem | undefined {
    for (const phase of session.plan.phases) {
      const item = phase.items.find((candidate) => candidate.id === itemId);
      if (item) return item;
    }
    return undefined;
  }

  private view(question: ServedQuestion, phase: FlowPhase): QuestionView {
    return { label: question.label, question: question.question, kind: question.kind, phase };
  }

  private async recordQuestion(sessionId: string, question: ServedQuestion): Promise<void> {
    await this.deps.repository.appendTurn(sessionId, {
      role: "interviewer",
      label: question.label,
      text: question.question,
      question_type: question.question_type,
      intent: null,
      dossier: null
    });
  }

  private async recordAnswer(
    sessionId: string,
    question: ServedQuestion,
    answer: string,
    dossier: Dossier | null
  ): Promise<void> {
    await this.deps.repository.appendTurn(sessionId, {
      role: "candidate",
      label: question.label,
      text: answer,
      question_type: question.question_type,
      intent: dossier?.intent ?? null,
      dossier: dossier && dossier.intent === "ANSWER" ? dossier : null
    });
  }
}

/** Dossiers of evaluated answers, latest per label. */
export function answeredDossiers(turns: readonly Turn[]): Dossier[] {
  const byLabel = new Map<string, Dossier>();
  for (const turn of turns) {
    if (turn.role === "candidate" && turn.dossier) {
      byLabel.set(turn.label, turn.dossier);
    }
  }
  return [...byLabel.values()];
}
