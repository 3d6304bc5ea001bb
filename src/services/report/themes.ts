/**
 * Short theme keys for coaching sentences, used to group evidence in the
 * report matrices.
 */

import { z } from "zod";
import { loadDataFile } from "../../utils/dataFile";

export interface ThemeClassifier {
  classify(sentence: string): string;
}

export type ThemeRule = { theme: string; pattern: RegExp };

const themeRulesSchema = z.array(
  z.object({
    theme: z.string().min(1),
    pattern: z.string().min(1)
  })
);

export function loadThemeRules(fileName = "themeRules.json"): ThemeRule[] {
  return loadDataFile(fileName, themeRulesSchema).map((rule) => ({
    theme: rule.theme,
    pattern: new RegExp(rule.pattern, "i")
  }));
}

const FALLBACK_WORDS = 4;

/** Quoted answer fragments say nothing about the theme. */
function withoutQuotes(sentence: string): string {
  return sentence.replace(/["“][^"“”]*["”]/g, " ");
}

export function fallbackTheme(sentence: string): string {
  const words = withoutQuotes(sentence)
    .replace(/[^\p{L}\p{N}\s-]/gu, " ")
    .split(/\s+/)
    .filter((word) => /[\p{L}\p{N}]/u.test(word))
    .slice(0, FALLBACK_WORDS);
  if (words.length === 0) return "General";
  const phrase = words.join(" ").toLowerCase();
  return phrase.charAt(0).toUpperCase() + phrase.slice(1);
}

/** First matching rule wins; unmatched sentences use their first few words. */
export class KeywordThemeClassifier implements ThemeClassifier {
  constructor(private readonly rules: readonly ThemeRule[] = loadThemeRules()) {}

  classify(sentence: string): string {
    const text = withoutQuotes(sentence);
    const rule = this.rules.find((candidate) => candidate.pattern.test(text));
    return rule ? rule.theme : fallbackTheme(sentence);
  }
}
