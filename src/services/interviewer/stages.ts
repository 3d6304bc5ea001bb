import { z } from "zod";
import type { StageDefinition } from "../chain/executor";
import { text, textList } from "../chain/schemaHelpers";

const JSON_ONLY = "Return ONLY one JSON object. No markdown, no code fences, no extra text.";

const softFollowUpSchema = z.object({
  follow_up_question: text
});

export const softFollowUpStage: StageDefinition<z.infer<typeof softFollowUpSchema>> = {
  name: "soft_followup",
  temperature: 0.6,
  maxTokens: 150,
  schema: softFollowUpSchema,
  template: `You are a warm interviewer at {company_name} hiring for {job_title}. Persona: {persona_description}
The candidate gave a short reply in the {question_type} part of the interview. Ask ONE gentle, short follow-up (under 80 characters) that helps them open up.
Hint: {deficit_hint}
Do not evaluate, do not use exclamation marks or emoji.

[Question]
{question}

[Reply]
{answer}

Output:
{"follow_up_question": "..."}
${JSON_ONLY}`
};

const followUpSchema = z.object({
  followups: z.array(z.unknown()).transform((items) => textList.parse(items)),
  rationale: text,
  transition_phrase: text
});

export type FollowUpStageOutput = z.infer<typeof followUpSchema>;

export const followUpStage: StageDefinition<FollowUpStageOutput> = {
  name: "followup",
  temperature: 0.5,
  maxTokens: 500,
  schema: followUpSchema,
  template: `You are interviewing for {job_title} at {company_name}. Persona: {persona_description}
Question style: {question_style_guide}

Write up to 2 follow-up questions for the candidate's latest answer.
- Target the expected points the answer has NOT covered yet, and the weakest scored areas.
- Each follow-up is one short question grounded in what the candidate said.
- Do not repeat or rephrase any already asked question.
- Do not quote figures the candidate did not mention.
- If nothing important is missing, return an empty list.
Also give a one-sentence transition phrase to the next topic.

[Question]
{question}

[Answer]
{answer}

[Unmet expected points]
{unmet_points}

[Evaluation notes]
{evaluation_notes}

[Already asked]
{asked_questions}

Output:
{"followups": ["..."], "rationale": "...", "transition_phrase": "..."}
${JSON_ONLY}`
};
