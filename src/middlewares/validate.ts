import type { Request } from "express";
import type { z } from "zod";
import { HttpError } from "../utils/httpError";

/** Parse the request body with a schema; a mismatch becomes a 400. */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request): T {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    const message = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join(", ");
    throw new HttpError(400, message);
  }
  return result.data;
}
