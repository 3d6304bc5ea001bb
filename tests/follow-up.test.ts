/**
 * Follow-up decisions: lightweight soft prompts, evidence demands, rubric-gap
 * questions from the model, template fallback and duplicate filtering.
 */

import { describe, expect, test } from "vitest";
import {
  FollowUpGenerator,
  hasRubricGap,
  isNearDuplicate,
  isSparseAnswer,
  isUnsupportedAssertion,
  unmetExpectedPoints,
  type FollowUpInput
} from "../src/services/interviewer/followUp";
import { sanitizeAgainstResume, statesFigure } from "../src/services/interviewer/resumeSanitizer";
import { ProviderError } from "../src/services/llm/types";
import {
  createRecordingLogger,
  FakeLLM,
  fakeExecutor,
  FOLLOW_UP_QUESTION,
  makeDossier,
  SAMPLE_ANSWER,
  SAMPLE_PERSONA,
  sampleContext
} from "./helpers";

const CORE_QUESTION = "Tell me about a time you fixed a slow service.";
const DEFAULT_TRANSITION = "Thank you. Let's move on to the next question.";

function input(overrides: Partial<FollowUpInput> = {}): FollowUpInput {
  return {
    questionType: "star",
    question: CORE_QUESTION,
    answer: SAMPLE_ANSWER,
    dossier: makeDossier({ scores_main: { situation: 16, task: 10, action: 16, result: 16 } }),
    expectedPoints: ["measured result", "stakeholder communication"],
    interview: sampleContext(),
    persona: SAMPLE_PERSONA,
    askedQuestions: ["How are you today?", CORE_QUESTION],
    ...overrides
  };
}

function generator(llm: FakeLLM) {
  const { logger, entries } = createRecordingLogger();
  return { followUps: new FollowUpGenerator({ executor: fakeExecutor(llm), logger, random: () => 0 }), entries };
}

describe("FollowUpGenerator.decide", () => {
  test("never follows up on a wrapup answer", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input({ questionType: "wrapup", answer: "No." }));

    expect(decision).toEqual({
      followups: [],
      sources: ["none"],
      fallback_used: false,
      transition_phrase: DEFAULT_TRANSITION,
      reason: "no follow-ups for this question type"
    });
    expect(llm.calls).toEqual([]);
  });

  test("skips a lightweight answer that meets the minimum length", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(
      input({ questionType: "icebreaking", question: "How are you today?", answer: "I'm doing well, thanks for having me today." })
    );

    expect(decision.followups).toEqual([]);
    expect(decision.reason).toBe("answer meets the minimum length");
    expect(llm.calls).toEqual([]);
  });

  test("asks one soft follow-up after a short lightweight answer", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input({ questionType: "icebreaking", question: "How are you today?", answer: "Fine." }));

    expect(decision.followups).toEqual(["What part of your day has gone best so far?"]);
    expect(decision.sources).toEqual(["soft_llm"]);
    expect(decision.fallback_used).toBe(false);
    expect(llm.calls.map((call) => call.stage)).toEqual(["soft_followup"]);
  });

  test("uses a soft template when the model's soft follow-up is unusable", async () => {
    const llm = new FakeLLM().respond(
      "soft_followup",
      JSON.stringify({ follow_up_question: `Could you tell me ${"much ".repeat(20)}more about how your morning went?` })
    );
    const { followUps, entries } = generator(llm);

    const decision = await followUps.decide(input({ questionType: "icebreaking", question: "How are you today?", answer: "Fine." }));

    expect(decision.followups).toEqual(["Is everything comfortable on your side, with your seat and connection?"]);
    expect(decision.sources).toEqual(["soft_template"]);
    expect(decision.fallback_used).toBe(true);
    expect(entries).toEqual([
      {
        level: "info",
        message: "[followUp] template fallback used",
        meta: { question_type: "icebreaking", reason: "answer shorter than minimum" }
      }
    ]);
  });

  test("fills company and role into a soft motivation template", async () => {
    const llm = new FakeLLM().respond("soft_followup", new ProviderError("HTTP 401: invalid key", false));
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input({ questionType: "motivation", question: "Why Northwind?", answer: "Good pay." }));

    expect(decision.followups).toEqual(["What is one more thing about Northwind that particularly drew you in?"]);
    expect(decision.fallback_used).toBe(true);
  });

  test("answers a sparse substantive reply with a template and no model call", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input({ answer: "We fixed it fast." }));

    expect(decision).toEqual({
      followups: ["What was your own specific role in that situation, as opposed to the team's?"],
      sources: ["template"],
      fallback_used: true,
      transition_phrase: DEFAULT_TRANSITION,
      reason: "answer too sparse to analyse"
    });
    expect(llm.calls).toEqual([]);
  });

  test("demands evidence first for an unsupported claim", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(
      input({ questionType: "competency", answer: "I am very confident I can handle anything you throw at me in this role." })
    );

    expect(decision.followups).toEqual([
      "Could you share a specific example, with concrete results, that shows this in practice?",
      FOLLOW_UP_QUESTION
    ]);
    expect(decision.sources).toEqual(["evidence", "llm"]);
    expect(decision.fallback_used).toBe(false);
    expect(decision.transition_phrase).toBe("Thanks, that helps.");
    expect(decision.reason).toBe("unsupported assertion");
  });

  test("asks nothing when the evaluation shows no rubric gap", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input({ dossier: makeDossier() }));

    expect(decision.followups).toEqual([]);
    expect(decision.reason).toBe("no rubric gap");
    expect(llm.calls).toEqual([]);
  });

  test("asks the model about a rubric gap and lists unmet expected points", async () => {
    const llm = new FakeLLM();
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input());

    expect(decision.followups).toEqual([FOLLOW_UP_QUESTION]);
    expect(decision.sources).toEqual(["llm"]);
    expect(decision.reason).toBe("rubric gap");
    const prompt = llm.callsFor("followup")[0].prompt;
    expect(prompt).toContain("[Unmet expected points]\n- measured result\n- stakeholder communication");
    expect(prompt).toContain("weak components: task: 10/20");
    expect(prompt).toContain("- How are you today?\n- Tell me about a time you fixed a slow service.");
  });

  test("flags the template fallback when the model returns no follow-ups", async () => {
    const llm = new FakeLLM().respond("followup", '{"followups": [], "rationale": "", "transition_phrase": ""}');
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input());

    expect(decision.followups).toEqual(["What was your own specific role in that situation, as opposed to the team's?"]);
    expect(decision.sources).toEqual(["template"]);
    expect(decision.fallback_used).toBe(true);
    expect(decision.transition_phrase).toBe(DEFAULT_TRANSITION);
  });

  test("drops questions that repeat what was already asked", async () => {
    const llm = new FakeLLM().respond(
      "followup",
      JSON.stringify({
        followups: ["Tell me about a time you fixed a slow service", "How did you decide where to add the cache?"],
        rationale: "",
        transition_phrase: "Thanks."
      })
    );
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input());

    expect(decision.followups).toEqual(["How did you decide where to add the cache?"]);
  });

  test("returns at most two follow-ups", async () => {
    const llm = new FakeLLM().respond(
      "followup",
      JSON.stringify({
        followups: [
          "How did you decide where to add the cache?",
          "Who else reviewed the pricing change?",
          "What would you monitor after launch?"
        ],
        rationale: "",
        transition_phrase: "Thanks."
      })
    );
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input());

    expect(decision.followups).toEqual(["How did you decide where to add the cache?", "Who else reviewed the pricing change?"]);
    expect(decision.sources).toEqual(["llm", "llm"]);
  });

  test("removes figures the resume does not contain", async () => {
    const llm = new FakeLLM().respond(
      "followup",
      JSON.stringify({
        followups: ["How was latency improved by 25%?", "How was API latency cut by 30%?"],
        rationale: "",
        transition_phrase: "Thanks."
      })
    );
    const { followUps } = generator(llm);

    const decision = await followUps.decide(input());

    expect(decision.followups).toEqual(["How was latency improved by how much?", "How was API latency cut by 30%?"]);
  });
});

describe("answer signals", () => {
  test("isUnsupportedAssertion needs a claim without concrete evidence", () => {
    expect(isUnsupportedAssertion("I am sure I would be perfect here.")).toBe(true);
    expect(isUnsupportedAssertion("I'm confident, for example I led the 2023 migration.")).toBe(false);
    expect(isUnsupportedAssertion("I worked on the billing team.")).toBe(false);
  });

  test("isSparseAnswer checks characters and words", () => {
    expect(isSparseAnswer("We fixed it fast.")).toBe(true);
    expect(isSparseAnswer("Supercalifragilisticexpialidocious antidisestablishment")).toBe(true);
    expect(isSparseAnswer(SAMPLE_ANSWER)).toBe(false);
  });

  test("hasRubricGap reads scores, empty components and failed scoring", () => {
    expect(hasRubricGap(null)).toBe(true);
    expect(hasRubricGap(makeDossier())).toBe(false);
    expect(hasRubricGap(makeDossier({ scores_main: { situation: 16, task: 14, action: 16, result: 16 } }))).toBe(true);
    expect(hasRubricGap(makeDossier({ extracted: { situation: "x", task: "", action: "y", result: "z" } }))).toBe(true);
    expect(hasRubricGap(makeDossier({ skipped_stages: ["scoring"] }))).toBe(true);
  });

  test("isNearDuplicate compares stemmed content words", () => {
    expect(isNearDuplicate("How did you measure the result?", ["How did you measure the results of that project?"])).toBe(true);
    expect(isNearDuplicate("What did you learn?", ["Describe your biggest failure."])).toBe(false);
    expect(isNearDuplicate("How did you do it?", ["How did you do it?"])).toBe(false);
  });

  test("unmetExpectedPoints keeps points the answer does not cover", () => {
    expect(unmetExpectedPoints(["database calls", "stakeholder communication"], SAMPLE_ANSWER)).toEqual([
      "stakeholder communication"
    ]);
  });

  test("sanitizeAgainstResume keeps figures the resume states", () => {
    const resume = "Cut API latency by 30% at Contoso.";
    expect(sanitizeAgainstResume("How was it improved by 25%?", resume)).toBe("How was it improved by how much?");
    expect(sanitizeAgainstResume("What did the 30% cut take?", resume)).toBe("What did the 30% cut take?");
    expect(sanitizeAgainstResume("Why did it take 6 months?", resume)).toBe("Why did it take a specific figure?");
  });

  test("sanitizeAgainstResume matches whole figures only", () => {
    expect(sanitizeAgainstResume("Why did it take 5 weeks?", "Joined Contoso in 2025.")).toBe(
      "Why did it take a specific figure?"
    );
    expect(sanitizeAgainstResume("Why did it take 5 weeks?", "Led 5 engineers in 2025.")).toBe("Why did it take 5 weeks?");
    expect(statesFigure("Grew revenue 12.5% in a year.", "2.5")).toBe(false);
    expect(statesFigure("Grew revenue 12.5% in a year.", "12.5%")).toBe(true);
  });
});
