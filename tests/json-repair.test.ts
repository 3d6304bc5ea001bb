import { describe, expect, test } from "vitest";
import {
  extractFencedBlock,
  extractLargestObjectSpan,
  isJsonObject,
  normalizeJsonText,
  repair
} from "../src/services/chain/jsonRepair";

describe("repair", () => {
  test("parses clean JSON directly", () => {
    expect(repair('{"intent": "ANSWER", "reason": "on topic"}')).toEqual({ intent: "ANSWER", reason: "on topic" });
  });

  test("reads the object inside a fenced block", () => {
    const raw = 'Here is the result:\n```json\n{"score": 12}\n```\nLet me know if you need more.';
    expect(repair(raw)).toEqual({ score: 12 });
  });

  test("takes the outermost braces when prose surrounds the object", () => {
    expect(repair('Sure! {"items": [1, 2], "nested": {"a": "{b}"}} Hope this helps')).toEqual({
      items: [1, 2],
      nested: { a: "{b}" }
    });
  });

  test("replaces typographic quotes", () => {
    expect(repair("{“feedback”: “Good structure”}")).toEqual({ feedback: "Good structure" });
  });

  test("keeps typographic quotes inside ASCII-quoted strings", () => {
    expect(repair('{"strengths": ["You said “I led the migration” clearly"], "feedback": "ok",}')).toEqual({
      strengths: ["You said “I led the migration” clearly"],
      feedback: "ok"
    });
    expect(repair("{“tip”: \"It’s “fine”\",}")).toEqual({ tip: "It’s “fine”" });
  });

  test("removes trailing commas in objects and arrays", () => {
    expect(repair('{"a": [1, 2,], }')).toEqual({ a: [1, 2] });
  });

  test("maps capitalized literals outside strings only", () => {
    expect(repair('{"text": "True story", "flag": False, "ok": True, "missing": None}')).toEqual({
      text: "True story",
      flag: false,
      ok: true,
      missing: null
    });
  });

  test("inserts a comma missing between lines", () => {
    expect(repair('{\n  "a": 1\n  "b": "x"\n}')).toEqual({ a: 1, b: "x" });
  });

  test("returns null when no object can be recovered", () => {
    expect(repair("")).toBeNull();
    expect(repair("   ")).toBeNull();
    expect(repair(null)).toBeNull();
    expect(repair(undefined)).toBeNull();
    expect(repair("I cannot help with that.")).toBeNull();
    expect(repair("[1, 2, 3]")).toBeNull();
  });
});

describe("repair helpers", () => {
  test("extractFencedBlock ignores text without fences and empty fences", () => {
    expect(extractFencedBlock('{"a": 1}')).toBeNull();
    expect(extractFencedBlock("```\n```")).toBeNull();
    expect(extractFencedBlock('```\n{"a": 1}')).toBe('{"a": 1}');
  });

  test("extractLargestObjectSpan needs an opening brace before a closing one", () => {
    expect(extractLargestObjectSpan("} nothing {")).toBeNull();
    expect(extractLargestObjectSpan('x {"a": {"b": 1}} y')).toBe('{"a": {"b": 1}}');
  });

  test("normalizeJsonText leaves string contents untouched", () => {
    expect(normalizeJsonText('{"note": "None, True, False,]"}')).toBe('{"note": "None, True, False,]"}');
  });

  test("isJsonObject rejects arrays and null", () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject("text")).toBe(false);
  });
});
