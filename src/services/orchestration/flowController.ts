/**
 * Interview flow controller. Pure functions over (plan, flow state): each call
 * returns the next state and never mutates its input. Phase and question
 * exhaustion are explicit checks against the plan's item counts.
 */

import { MAX_FOLLOWUPS_PER_QUESTION, MAX_PENDING_FOLLOWUPS } from "../interviewer/constants";
import { followUpLabel } from "./labels";
import type { FlowPhase, FlowState, PhaseKey, Plan, ServedQuestion } from "./types";

export type NextQuestionResult = { done: false; question: ServedQuestion } | { done: true };

export type FlowStep = { state: FlowState; result: NextQuestionResult };

const PHASE_STATE: Record<PhaseKey, FlowPhase> = {
  intro: "INTRO",
  core: "CORE",
  wrapup: "WRAPUP"
};

export function initialFlowState(): FlowState {
  return {
    phase_index: 0,
    question_index: 0,
    followup_index: 0,
    pending_followups: [],
    last_main_question_id: null,
    current: null,
    done: false
  };
}

export function flowPhase(plan: Plan, state: FlowState): FlowPhase {
  if (state.done) return "FINISHED";
  const phase = plan.phases[state.phase_index];
  return phase ? PHASE_STATE[phase.key] : "FINISHED";
}

/** 1-based ordinal of the item at (phaseIndex, questionIndex) across the whole plan. */
export function mainLabelAt(plan: Plan, phaseIndex: number, questionIndex: number): string {
  let ordinal = questionIndex + 1;
  for (let i = 0; i < phaseIndex; i += 1) {
    ordinal += plan.phases[i].items.length;
  }
  return String(ordinal);
}

function finished(state: FlowState): FlowStep {
  return {
    state: { ...state, pending_followups: [], current: null, done: true },
    result: { done: true }
  };
}

/**
 * Serve the next question: a pending follow-up of the current main question
 * first, otherwise the next main item. Returns done once the plan is exhausted,
 * and keeps returning done afterwards.
 */
export function nextQuestion(plan: Plan, state: FlowState): FlowStep {
  if (state.done) return { state, result: { done: true } };

  const current = state.current;
  if (current && state.pending_followups.length > 0) {
    const [text, ...rest] = state.pending_followups;
    const followupIndex = state.followup_index + 1;
    const question: ServedQuestion = {
      kind: "followup",
      label: followUpLabel(current.main_label, followupIndex),
      main_label: current.main_label,
      item_id: current.item_id,
      question_type: current.question_type,
      question: text
    };
    return {
      state: { ...state, followup_index: followupIndex, pending_followups: rest, current: question },
      result: { done: false, question }
    };
  }

  let phaseIndex = state.phase_index;
  let questionIndex = current ? state.question_index + 1 : state.question_index;
  while (phaseIndex < plan.phases.length && questionIndex >= plan.phases[phaseIndex].items.length) {
    phaseIndex += 1;
    questionIndex = 0;
  }
  if (phaseIndex >= plan.phases.length) {
    return finished({ ...state, phase_index: plan.phases.length, question_index: 0, followup_index: 0 });
  }

  const item = plan.phases[phaseIndex].items[questionIndex];
  const label = mainLabelAt(plan, phaseIndex, questionIndex);
  const question: ServedQuestion = {
    kind: "main",
    label,
    main_label: label,
    item_id: item.id,
    question_type: item.type,
    question: item.question
  };
  return {
    state: {
      ...state,
      phase_index: phaseIndex,
      question_index: questionIndex,
      followup_index: 0,
      pending_followups: [],
      last_main_question_id: item.id,
      current: question
    },
    result: { done: false, question }
  };
}

/** What nextQuestion would serve, without committing the new state. */
export function peekNextQuestion(plan: Plan, state: FlowState): NextQuestionResult {
  return nextQuestion(plan, state).result;
}

/**
 * Queue follow-ups for the current main question. The queue never holds more
 * than MAX_PENDING_FOLLOWUPS, and one main question never gets more than
 * MAX_FOLLOWUPS_PER_QUESTION in total.
 */
export function enqueueFollowUps(state: FlowState, followups: readonly string[]): FlowState {
  if (state.done || !state.current || followups.length === 0) return state;
  const queueRoom = MAX_PENDING_FOLLOWUPS - state.pending_followups.length;
  const questionRoom = MAX_FOLLOWUPS_PER_QUESTION - state.followup_index - state.pending_followups.length;
  const room = Math.max(0, Math.min(queueRoom, questionRoom));
  if (room === 0) return state;
  return { ...state, pending_followups: [...state.pending_followups, ...followups.slice(0, room)] };
}

/** Mark the interview finished regardless of the cursor. */
export function finishFlow(state: FlowState): FlowState {
  return finished(state).state;
}
