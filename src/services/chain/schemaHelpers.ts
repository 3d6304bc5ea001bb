import { z } from "zod";

/** Lenient field helpers for model output: missing or mistyped values fall back to empty. */

export const text = z
  .unknown()
  .transform((value) => (typeof value === "string" ? value.trim() : typeof value === "number" ? String(value) : ""));

export const textList = z
  .unknown()
  .transform((value) =>
    Array.isArray(value)
      ? value
          .filter((item): item is string => typeof item === "string")
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : []
  );

export const looseNumber = z.unknown().transform((value) => {
  const numeric =
    typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  return Number.isFinite(numeric) ? numeric : 0;
});

export const looseBoolean = z.unknown().transform((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return ["true", "yes", "1"].includes(value.trim().toLowerCase());
  return false;
});

export const record = z.record(z.string(), z.unknown());

export const looseRecord = z
  .unknown()
  .transform((value): Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {}
  );
