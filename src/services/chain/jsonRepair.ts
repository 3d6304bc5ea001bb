/**
 * Recover one JSON object from noisy model output.
 * Steps: direct parse, fenced block, largest {...} span, textual normalization, parse again.
 */

export type JsonObject = Record<string, unknown>;

const FENCE_RE = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)(?:```|$)/;
const SMART_DOUBLE_RE = /[“”„‟″«»]/g;
const SMART_SINGLE_RE = /[‘’‚‛′]/g;
const MISSING_COMMA_RE = /("|\d|\btrue|\bfalse|\bnull|\}|\])([ \t]*\r?\n\s*)(")/g;
const TRAILING_COMMA_RE = /,(\s*[}\]])/g;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

export function extractFencedBlock(text: string): string | null {
  if (!text.includes("```")) return null;
  const match = FENCE_RE.exec(text);
  if (!match) return null;
  const inner = match[1].trim();
  return inner.length > 0 ? inner : null;
}

export function extractLargestObjectSpan(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) return null;
  return text.slice(start, end + 1);
}

/** Apply `fn` to every stretch of text that lies outside a double-quoted string. */
function mapOutsideStrings(text: string, fn: (segment: string) => string): string {
  let out = "";
  let buffer = "";
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      out += fn(buffer) + ch;
      buffer = "";
      inString = true;
      continue;
    }
    buffer += ch;
  }
  return out + fn(buffer);
}

function fixBareSegment(segment: string): string {
  return segment
    .replace(/\bTrue\b/g, "true")
    .replace(/\bFalse\b/g, "false")
    .replace(/\bNone\b/g, "null")
    .replace(TRAILING_COMMA_RE, "$1");
}

/** Typographic quotes inside an ASCII-quoted string are content and stay as written. */
function asciiQuotes(segment: string): string {
  return segment.replace(SMART_DOUBLE_RE, '"').replace(SMART_SINGLE_RE, "'");
}

export function normalizeJsonText(text: string): string {
  const ascii = mapOutsideStrings(text, asciiQuotes);
  const literalsFixed = mapOutsideStrings(ascii, fixBareSegment);
  const commasInserted = literalsFixed.replace(MISSING_COMMA_RE, "$1,$2$3");
  return mapOutsideStrings(commasInserted, (segment) => segment.replace(TRAILING_COMMA_RE, "$1"));
}

export function repair(text: string | null | undefined): JsonObject | null {
  if (typeof text !== "string") return null;
  const trimmed = text.trim();
  if (!trimmed) return null;

  const direct = tryParseObject(trimmed);
  if (direct) return direct;

  const fenced = extractFencedBlock(trimmed);
  if (fenced !== null) {
    const parsed = tryParseObject(fenced);
    if (parsed) return parsed;
  }

  const source = fenced ?? trimmed;
  const span = extractLargestObjectSpan(source);
  if (span !== null) {
    const parsed = tryParseObject(span);
    if (parsed) return parsed;
  }

  return tryParseObject(normalizeJsonText(span ?? source));
}
