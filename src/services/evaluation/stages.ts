/**
 * Prompt stages of the answer evaluation chain. Each stage declares the
 * variables it reads and a schema for the object it must return.
 */

import { z } from "zod";
import type { StageDefinition } from "../chain/executor";
import { looseBoolean, looseNumber, looseRecord, record, text, textList } from "../chain/schemaHelpers";
import { ANSWER_INTENTS } from "./types";

const JSON_ONLY = "Return ONLY one JSON object. No markdown, no code fences, no extra text.";

const CONTEXT_BLOCK = `[Context]
- company: {company_name}
- role: {job_title}
- interviewer persona: {persona_description}
- evaluation focus: {evaluation_focus}
- question type: {question_type}`;

// --- 1. Intent ---

const intentSchema = z.object({
  intent: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toUpperCase().replace(/[\s-]+/g, "_") : value),
    z.enum(ANSWER_INTENTS)
  ),
  reason: text
});

export const intentStage: StageDefinition<z.infer<typeof intentSchema>> = {
  name: "intent",
  temperature: 0,
  maxTokens: 200,
  schema: intentSchema,
  template: `Classify the candidate's reply to an interview question.

Categories:
- ANSWER: an attempt to answer the question, even if weak or short.
- IRRELEVANT: a response that is completely unrelated to the question.
- QUESTION: the candidate asks the interviewer something unrelated to clarifying this question.
- CLARIFICATION_REQUEST: the candidate asks for the question to be repeated or clarified.
- CANNOT_ANSWER: the candidate explicitly says they cannot answer or do not know.

[Question]
{question}

[Reply]
{answer}

Output:
{"intent": "ANSWER|IRRELEVANT|QUESTION|CLARIFICATION_REQUEST|CANNOT_ANSWER", "reason": "one sentence"}
${JSON_ONLY}`
};

// --- 2. Framework identification ---

const frameworkSchema = z.object({
  frameworks: z.array(z.unknown()).transform((items) =>
    items.filter((item): item is string => typeof item === "string" && item.trim().length > 0)
  ),
  rationale: text
});

export const frameworkStage: StageDefinition<z.infer<typeof frameworkSchema>> = {
  name: "framework",
  temperature: 0,
  maxTokens: 300,
  schema: frameworkSchema,
  template: `${CONTEXT_BLOCK}

Identify which answer-structuring framework the candidate's answer actually follows.
Choose from STAR, COMPETENCY, CASE, SYSTEMDESIGN. Decide only from explicit textual evidence in the answer, never from keywords in the question.
Append extension flags when the answer explicitly contains them: +C (a challenge overcome), +L (a learning or reflection), +M (quantified metrics or outcomes).
List the best fit first.

[Question]
{question}

[Answer]
{answer}

Output:
{"frameworks": ["STAR+M", "COMPETENCY"], "rationale": "short explanation quoting the evidence"}
${JSON_ONLY}`
};

// --- 3. Extraction ---

const extractionSchema = z.object({
  extracted: record
});

export const extractionStage: StageDefinition<z.infer<typeof extractionSchema>> = {
  name: "extraction",
  temperature: 0,
  maxTokens: 900,
  schema: extractionSchema,
  template: `Summarize the candidate's answer along the components of the {framework_name} framework.

Rules:
- Use ONLY these keys: {component_list}
- Do not add any other key.
- Summarize only what the candidate actually said. If a component is missing, use "" and never invent content.

[Question]
{question}

[Answer]
{answer}

Output:
{"extracted": {"<component>": "summary or empty string"}}
${JSON_ONLY}`
};

// --- 4. Scoring ---

const scoringSchema = z.object({
  scores_main: record,
  scores_ext: looseRecord,
  scoring_reason: text
});

export const scoringStage: StageDefinition<z.infer<typeof scoringSchema>> = {
  name: "scoring",
  temperature: 0,
  maxTokens: 900,
  schema: scoringSchema,
  template: `${CONTEXT_BLOCK}

Score the answer using the {framework_name} framework.
- Base components {component_list}: 0-20 each.
- Extension components {extension_list}: 0-10 each. Score only the listed extensions.
- A component that is absent from the answer scores 0.
- Ground your judgement in the competency context below and the extracted components.

[Competency context]
{competency_hints}

[Expected points]
{expected_points}

[Extracted components]
{extracted}

[Answer]
{answer}

Output:
{"scores_main": {"<component>": 0}, "scores_ext": {"<extension>": 0}, "scoring_reason": "300-600 character summary"}
${JSON_ONLY}`
};

// --- 5. Score explanation ---

const calibrationEntrySchema = z.object({
  element: z.string(),
  given: looseNumber,
  max: looseNumber,
  gap: looseNumber,
  why_not_max: text,
  how_to_improve: textList
});

const explanationSchema = z.object({
  calibration: z.array(calibrationEntrySchema),
  ext_calibration: z.array(calibrationEntrySchema).catch([]),
  overall_tip: text
});

export type ExplanationOutput = z.infer<typeof explanationSchema>;

export const explanationStage: StageDefinition<ExplanationOutput> = {
  name: "explanation",
  temperature: 0.2,
  maxTokens: 1200,
  schema: explanationSchema,
  template: `Explain each score of a {framework_name} evaluation.
For every scored element give the gap from its maximum, why it did not reach the maximum, and 1-3 concrete actions that would raise it.

[Scores]
main (max 20 each): {scores_main}
extensions (max 10 each): {scores_ext}

[Scoring reason]
{scoring_reason}

[Answer]
{answer}

Output:
{"calibration": [{"element": "situation", "given": 0, "max": 20, "gap": 20, "why_not_max": "...", "how_to_improve": ["..."]}],
 "ext_calibration": [{"element": "metrics", "given": 0, "max": 10, "gap": 10, "why_not_max": "...", "how_to_improve": ["..."]}],
 "overall_tip": "the 2-3 highest priority changes for the next answer"}
${JSON_ONLY}`
};

// --- 6. Coaching ---

const coachingSchema = z.object({
  strengths: z.array(z.unknown()).transform((items) => textList.parse(items)),
  improvements: z.array(z.unknown()).transform((items) => textList.parse(items)),
  feedback: text
});

export const coachingStage: StageDefinition<z.infer<typeof coachingSchema>> = {
  name: "coaching",
  temperature: 0.4,
  maxTokens: 1200,
  schema: coachingSchema,
  template: `${CONTEXT_BLOCK}

Coach the candidate on this answer.
- Give 3-5 strengths and 3-5 improvements.
- Every item MUST quote a specific phrase from the answer in double quotes, then explain it.
- Close with 3-5 sentences of overall feedback.

[Scoring reason]
{scoring_reason}

[Question]
{question}

[Answer]
{answer}

Output:
{"strengths": ["\\"quoted phrase\\" - why it works"], "improvements": ["\\"quoted phrase\\" - how to improve"], "feedback": "..."}
${JSON_ONLY}`
};

// --- 7. Model answer ---

const modelAnswerSchema = z.object({
  model_answer: z.string().min(1),
  model_answer_framework: text,
  selection_reason: text
});

export const modelAnswerStage: StageDefinition<z.infer<typeof modelAnswerSchema>> = {
  name: "model_answer",
  temperature: 0.5,
  maxTokens: 1000,
  schema: modelAnswerSchema,
  template: `${CONTEXT_BLOCK}

Write one improved model answer to the question, 400-800 characters, keeping the candidate's own experience and facts. Do not invent employers, numbers or projects that the answer and resume do not mention.
Pick the framework (STAR, CASE, SYSTEMDESIGN, COMPETENCY) that fits the model answer best and justify it by mapping 2-3 of its components.

[Question]
{question}

[Candidate answer]
{answer}

[Improvement notes]
{improvements}

[Resume]
{resume}

Output:
{"model_answer": "...", "model_answer_framework": "STAR", "selection_reason": "..."}
${JSON_ONLY}`
};

// --- 8. Bias filter ---

const biasIssueSchema = z.object({
  span: text,
  category: text,
  reason: text,
  suggested_fix: text,
  severity: z.enum(["low", "medium", "high"]).catch("medium")
});

const biasSchema = z.object({
  flagged: looseBoolean,
  issues: z.array(biasIssueSchema).catch([]),
  sanitized: z
    .object({
      strengths: textList,
      improvements: textList,
      feedback: text,
      model_answer: text
    })
    .catch({ strengths: [], improvements: [], feedback: "", model_answer: "" })
});

export type BiasFilterOutput = z.infer<typeof biasSchema>;

export const biasFilterStage: StageDefinition<BiasFilterOutput> = {
  name: "bias_filter",
  temperature: 0,
  maxTokens: 1500,
  schema: biasSchema,
  template: `Review generated interview feedback for bias, discriminatory assumptions, offensive tone, or use of sensitive personal attributes (age, gender, ethnicity, religion, disability, family status, nationality).
If nothing is wrong, return flagged false and empty fields.
If something is wrong, return flagged true, list each issue, and rewrite ONLY the affected fields neutrally, keeping length and meaning.

[Generated feedback]
{generated_text}

Output:
{"flagged": false,
 "issues": [{"span": "...", "category": "bias|discriminatory assumption|aggression|sensitive attribute|overconfidence|other", "reason": "...", "suggested_fix": "...", "severity": "low|medium|high"}],
 "sanitized": {"strengths": [], "improvements": [], "feedback": "", "model_answer": ""}}
${JSON_ONLY}`
};
