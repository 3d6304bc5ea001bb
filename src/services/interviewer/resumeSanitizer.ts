/**
 * Follow-up questions must not put figures in the candidate's mouth: any number
 * that does not appear in the resume is replaced with a neutral phrase.
 */

const NUMBER_TOKEN_RE = /\d+(?:[.,]\d+)*(?:%|\s?(?:percent|x|ms|hours?|days?|weeks?|months?|years?)\b)?/gi;
const PLACEHOLDER = "a specific figure";
const HOW_MUCH_RE = /\b(improv|increas|reduc|decreas|grow|grew|shorten|cut)(\w*) by a specific figure/gi;

export function extractNumberTokens(text: string): string[] {
  return text.match(NUMBER_TOKEN_RE) ?? [];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** "5" is not stated by "2025": the figure must not continue another number on either side. */
export function statesFigure(resume: string, figure: string): boolean {
  if (!figure) return false;
  return new RegExp(`(?<!\\d[.,]?)${escapeRegExp(figure)}(?![.,]?\\d)`, "i").test(resume);
}

export function sanitizeAgainstResume(text: string, resume: string): string {
  let out = text;
  for (const token of new Set(extractNumberTokens(text))) {
    const digits = token.replace(/[^\d.,]/g, "");
    if (!statesFigure(resume, token) && !statesFigure(resume, digits)) {
      out = out.split(token).join(PLACEHOLDER);
    }
  }
  return out.replace(HOW_MUCH_RE, "$1$2 by how much");
}
