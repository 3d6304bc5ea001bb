/**
 * Resume feedback for the final report: how the resume lines up with the job
 * description and the role context. The model writes it; a keyword comparison
 * of the two documents stands in when the model fails.
 */

import { z } from "zod";
import type { Logger } from "../../config/logger";
import { createNoopLogger } from "../../config/logger";
import type { PromptChainExecutor, StageDefinition } from "../chain/executor";
import { text } from "../chain/schemaHelpers";
import { contentWords } from "../interviewer/followUp";
import type { InterviewContext } from "../orchestration/types";
import type { ResumeFeedback } from "./types";

const RESUME_MAX_CHARS = 15000;
const JOB_DESCRIPTION_MAX_CHARS = 8000;
const MAX_LISTED_TERMS = 8;

const resumeFeedbackSchema = z.object({
  job_fit_assessment: text,
  strengths_and_opportunities: text,
  gaps_and_improvements: text
});

export const resumeFeedbackStage: StageDefinition<z.infer<typeof resumeFeedbackSchema>> = {
  name: "resume_feedback",
  temperature: 0.2,
  maxTokens: 1200,
  schema: resumeFeedbackSchema,
  template: `You are a recruiter and career coach reviewing a resume against the {job_title} position at {company_name}.

[Job description]
{job_description}

[Role context]
{role_context}

[Resume]
{resume}

Compare the resume with the job description and the role context. Check keyword coverage, quantified results, consistency of roles and dates, and claims without evidence.
Write:
- job_fit_assessment: overall fit (high, medium or low) and the main reasons.
- strengths_and_opportunities: what the resume already supports and how to make more of it.
- gaps_and_improvements: missing or weak points, each with a concrete rewrite suggestion.

Output:
{"job_fit_assessment": "...", "strengths_and_opportunities": "...", "gaps_and_improvements": "..."}
Return ONLY one JSON object. No markdown, no code fences, no extra text.`
};

export type ResumeDocuments = Pick<InterviewContext, "resume" | "job_description">;

/** Job description terms split by whether the resume mentions them, in job description order. */
export function compareTerms(documents: ResumeDocuments): { covered: string[]; missing: string[] } {
  const resumeWords = contentWords(documents.resume);
  const covered: string[] = [];
  const missing: string[] = [];
  for (const term of contentWords(documents.job_description)) {
    if (term.length < 3 || /^\d+$/.test(term)) continue;
    (resumeWords.has(term) ? covered : missing).push(term);
  }
  return { covered, missing };
}

export function fallbackResumeFeedback(documents: ResumeDocuments): ResumeFeedback {
  if (!documents.resume.trim()) {
    return {
      job_fit_assessment: "No resume was provided, so resume fit was not assessed.",
      strengths_and_opportunities: "",
      gaps_and_improvements: "",
      source: "fallback"
    };
  }
  const { covered, missing } = compareTerms(documents);
  const total = covered.length + missing.length;
  if (total === 0) {
    return {
      job_fit_assessment: "No job description was provided to compare the resume against.",
      strengths_and_opportunities: "",
      gaps_and_improvements: "",
      source: "fallback"
    };
  }
  return {
    job_fit_assessment: `The resume mentions ${covered.length} of ${total} key terms from the job description.`,
    strengths_and_opportunities:
      covered.length > 0
        ? `Terms the resume already supports: ${covered.slice(0, MAX_LISTED_TERMS).join(", ")}.`
        : "The resume does not yet use the job description's key terms.",
    gaps_and_improvements:
      missing.length > 0
        ? `Terms from the job description the resume does not mention: ${missing.slice(0, MAX_LISTED_TERMS).join(", ")}. ` +
          "Add a concrete, quantified example for each one that applies."
        : "Every key term from the job description appears in the resume.",
    source: "fallback"
  };
}

export type GenerateResumeFeedbackDeps = {
  executor: PromptChainExecutor;
  logger?: Logger;
  sessionId?: string;
};

export async function generateResumeFeedback(
  context: InterviewContext,
  deps: GenerateResumeFeedbackDeps
): Promise<ResumeFeedback> {
  const fallback = fallbackResumeFeedback(context);
  // Nothing to review.
  if (!context.resume.trim()) return fallback;

  const logger = deps.logger ?? createNoopLogger();
  const result = await deps.executor.run(resumeFeedbackStage, {
    company_name: context.company_name,
    job_title: context.job_title,
    job_description: context.job_description.slice(0, JOB_DESCRIPTION_MAX_CHARS) || "(not provided)",
    role_context: context.competency_hints.map((hint) => `- ${hint}`).join("\n") || "(none)",
    resume: context.resume.slice(0, RESUME_MAX_CHARS)
  });

  if (!result.success || !result.data.job_fit_assessment) {
    logger.warn("[report] resume feedback failed, using keyword comparison", {
      session_id: deps.sessionId,
      error: result.success ? "empty assessment" : result.error
    });
    return fallback;
  }
  return {
    job_fit_assessment: result.data.job_fit_assessment,
    strengths_and_opportunities: result.data.strengths_and_opportunities || fallback.strengths_and_opportunities,
    gaps_and_improvements: result.data.gaps_and_improvements || fallback.gaps_and_improvements,
    source: "llm"
  };
}
