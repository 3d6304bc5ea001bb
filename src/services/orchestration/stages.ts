import { z } from "zod";
import type { StageDefinition } from "../chain/executor";
import { looseRecord } from "../chain/schemaHelpers";

const JSON_ONLY = "Return ONLY one JSON object. No markdown, no code fences, no extra text.";

const planSchema = looseRecord;

export const planStage: StageDefinition<z.infer<typeof planSchema>> = {
  name: "plan",
  temperature: 0.3,
  maxTokens: 3200,
  schema: planSchema,
  template: `You are designing a structured interview for the {job_title} position at {company_name}.
Persona: {persona_description}
Question style: {question_style_guide}
Difficulty: {difficulty_instruction}
Interview language: {language}

[Job description]
{job_description}

[Candidate resume]
{resume}

[Competency hints]
{competency_hints}

Design three phases:
- intro: one icebreaking question, one self_intro question, one motivation question.
- core: {core_count} questions of types star, competency, case, system or hard, tailored to the role and the resume.
- wrapup: one wrapup question.
For each item give the expected evaluation points and a rubric of score bands (score 1-5 with a short descriptor).

Output:
{"phases": [{"key": "intro|core|wrapup", "items": [{"type": "...", "question": "...", "expected_points": ["..."], "rubric": [{"score": 5, "descriptor": "..."}]}]}]}
${JSON_ONLY}`
};
