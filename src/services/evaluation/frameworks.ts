/**
 * Framework component sets and the single lookup table that maps every score or
 * component key a model may emit (abbreviations, spelling variants) onto the
 * canonical key for that framework.
 */

import {
  EXTENSION_KEYS,
  FRAMEWORKS,
  type ExtensionKey,
  type Framework
} from "./types";

export const FRAMEWORK_COMPONENTS = {
  STAR: ["situation", "task", "action", "result"],
  COMPETENCY: ["competency", "behavior", "impact"],
  CASE: ["problem", "structure", "analysis", "recommendation"],
  SYSTEMDESIGN: ["requirements", "tradeoffs", "architecture", "risks"]
} as const satisfies Record<Framework, readonly string[]>;

export type ComponentKey = (typeof FRAMEWORK_COMPONENTS)[Framework][number];

export const MAIN_COMPONENT_MAX = 20;
export const EXTENSION_COMPONENT_MAX = 10;
export const DEFAULT_FRAMEWORK: Framework = "COMPETENCY";

const COMPONENT_ALIASES: Record<Framework, Record<string, ComponentKey>> = {
  STAR: { s: "situation", t: "task", a: "action", r: "result", results: "result", actions: "action" },
  COMPETENCY: { c: "competency", b: "behavior", behaviour: "behavior", behaviors: "behavior", i: "impact" },
  CASE: {
    p: "problem",
    s: "structure",
    stucture: "structure",
    a: "analysis",
    r: "recommendation",
    recommendations: "recommendation"
  },
  SYSTEMDESIGN: {
    r: "requirements",
    requirement: "requirements",
    t: "tradeoffs",
    tradeoff: "tradeoffs",
    a: "architecture",
    risk: "risks"
  }
};

const EXTENSION_ALIASES: Record<string, ExtensionKey> = {
  c: "challenge",
  challenges: "challenge",
  l: "learning",
  learnings: "learning",
  m: "metrics",
  metric: "metrics"
};

const FRAMEWORK_ALIASES: Record<string, Framework> = {
  star: "STAR",
  competency: "COMPETENCY",
  competencybased: "COMPETENCY",
  base: "COMPETENCY",
  case: "CASE",
  mece: "CASE",
  casemece: "CASE",
  systemdesign: "SYSTEMDESIGN",
  system: "SYSTEMDESIGN",
  sd: "SYSTEMDESIGN"
};

/** Lowercase and drop separators so "Trade-offs", "trade_offs" and "TRADEOFFS" compare equal. */
export function canonicalToken(key: string): string {
  return key.toLowerCase().replace(/[\s_\-/]+/g, "");
}

function buildScoreKeyTable(): ReadonlyMap<Framework, ReadonlyMap<string, ComponentKey>> {
  const table = new Map<Framework, Map<string, ComponentKey>>();
  for (const framework of FRAMEWORKS) {
    const entries = new Map<string, ComponentKey>();
    const components: readonly ComponentKey[] = FRAMEWORK_COMPONENTS[framework];
    for (const component of components) {
      entries.set(canonicalToken(component), component);
    }
    for (const [alias, component] of Object.entries(COMPONENT_ALIASES[framework])) {
      entries.set(canonicalToken(alias), component);
    }
    table.set(framework, entries);
  }
  return table;
}

function buildExtensionTable(): ReadonlyMap<string, ExtensionKey> {
  const table = new Map<string, ExtensionKey>();
  for (const key of EXTENSION_KEYS) table.set(key, key);
  for (const [alias, key] of Object.entries(EXTENSION_ALIASES)) table.set(alias, key);
  return table;
}

export const SCORE_KEY_TABLE = buildScoreKeyTable();
export const EXTENSION_KEY_TABLE = buildExtensionTable();

export function componentsOf(framework: Framework): readonly ComponentKey[] {
  return FRAMEWORK_COMPONENTS[framework];
}

export function normalizeComponentKey(framework: Framework, key: string): ComponentKey | null {
  return SCORE_KEY_TABLE.get(framework)?.get(canonicalToken(key)) ?? null;
}

export function normalizeExtensionKey(key: string): ExtensionKey | null {
  return EXTENSION_KEY_TABLE.get(canonicalToken(key)) ?? null;
}

export function normalizeFrameworkName(name: string): Framework | null {
  return FRAMEWORK_ALIASES[canonicalToken(name).replace(/[^a-z]/g, "")] ?? null;
}

/**
 * Parse an identifier tag such as "STAR+M+L" into its base framework and
 * extension flags. Unknown bases yield null.
 */
export function parseFrameworkTag(tag: string): { framework: Framework | null; extensions: ExtensionKey[] } {
  const [base, ...flags] = tag.split("+").map((part) => part.trim());
  const extensions: ExtensionKey[] = [];
  for (const flag of flags) {
    const key = normalizeExtensionKey(flag);
    if (key && !extensions.includes(key)) extensions.push(key);
  }
  return { framework: normalizeFrameworkName(base ?? ""), extensions };
}

export function toScore(value: unknown, max: number): number {
  const numeric =
    typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(numeric)) return 0;
  return Math.min(max, Math.max(0, Math.round(numeric)));
}

export type NormalizedScores = {
  scores_main: Record<string, number>;
  scores_ext: Partial<Record<ExtensionKey, number>>;
};

/**
 * Map raw score objects onto the framework's component keys. Every declared
 * component is present (absent ones score 0); only flagged extensions are kept.
 */
export function normalizeScores(
  framework: Framework,
  rawMain: Record<string, unknown>,
  rawExt: Record<string, unknown>,
  extensions: readonly ExtensionKey[]
): NormalizedScores {
  const scores_main: Record<string, number> = {};
  for (const component of componentsOf(framework)) {
    scores_main[component] = 0;
  }
  for (const [key, value] of Object.entries(rawMain)) {
    const component = normalizeComponentKey(framework, key);
    if (component) {
      scores_main[component] = toScore(value, MAIN_COMPONENT_MAX);
    }
  }

  const scores_ext: Partial<Record<ExtensionKey, number>> = {};
  for (const key of extensions) {
    scores_ext[key] = 0;
  }
  for (const [key, value] of Object.entries(rawExt)) {
    const extension = normalizeExtensionKey(key);
    if (extension && extensions.includes(extension)) {
      scores_ext[extension] = toScore(value, EXTENSION_COMPONENT_MAX);
    }
  }
  return { scores_main, scores_ext };
}

/** Keep only the framework's declared components; missing content is "". */
export function normalizeExtraction(
  framework: Framework,
  raw: Record<string, unknown>
): Record<string, string> {
  const extracted: Record<string, string> = {};
  for (const component of componentsOf(framework)) {
    extracted[component] = "";
  }
  for (const [key, value] of Object.entries(raw)) {
    const component = normalizeComponentKey(framework, key);
    if (component && typeof value === "string") {
      extracted[component] = value.trim();
    }
  }
  return extracted;
}
