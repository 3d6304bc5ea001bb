import { z } from "zod";
import { loadDataFile } from "../../utils/dataFile";
import { ensureQuestionMark, firstSentence } from "../../utils/text";
import { renderTemplate } from "../chain/template";
import type { AnswerIntent } from "../evaluation/types";

export type RecoverableIntent = Exclude<AnswerIntent, "ANSWER">;

/** What the caller should do after a recovery prompt. */
export type RecoveryAction = "answer_again" | "next_question";

export type RecoveryPrompt = {
  intent: RecoverableIntent;
  message: string;
  next_action: RecoveryAction;
};

const recoveryTemplatesSchema = z.object({
  CLARIFICATION_REQUEST: z.string().min(1),
  IRRELEVANT: z.string().min(1),
  QUESTION: z.string().min(1),
  CANNOT_ANSWER: z.string().min(1)
});

export type RecoveryTemplates = z.infer<typeof recoveryTemplatesSchema>;

export function loadRecoveryTemplates(): RecoveryTemplates {
  return loadDataFile("recoveryTemplates.json", recoveryTemplatesSchema);
}

/** Core of a question: its first sentence, always ending in a question mark. */
export function questionCore(question: string): string {
  return ensureQuestionMark(firstSentence(question));
}

/**
 * Scripted reply for an answer that was not an answer. Only CANNOT_ANSWER
 * moves the interview on; the others ask for the same question again.
 */
export function recoveryPrompt(
  intent: RecoverableIntent,
  lastQuestion: string,
  templates: RecoveryTemplates = loadRecoveryTemplates()
): RecoveryPrompt {
  const message = renderTemplate(templates[intent], { core: questionCore(lastQuestion) }, `recovery_${intent}`);
  return {
    intent,
    message,
    next_action: intent === "CANNOT_ANSWER" ? "next_question" : "answer_again"
  };
}
