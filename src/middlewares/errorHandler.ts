import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import type { Logger } from "../config/logger";
import { errorMeta } from "../config/logger";
import { ProviderUnavailableError } from "../services/llm/types";
import { SessionFinishedError, SessionNotFoundError } from "../services/persistence/types";
import { HttpError } from "../utils/httpError";

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

/** express.json() rejects unparseable bodies with a SyntaxError carrying status 400. */
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && "status" in error && error.status === 400;
}

function statusFor(error: unknown): number | null {
  if (error instanceof HttpError) return error.statusCode;
  if (isBodyParseError(error)) return 400;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof SessionFinishedError) return 409;
  if (error instanceof ProviderUnavailableError) return 503;
  return null;
}

export function createErrorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: error.issues.map((i) => i.message).join(", ") });
      return;
    }

    const status = statusFor(error);
    if (status !== null && error instanceof Error) {
      if (status >= 500) {
        logger.error("[http] upstream unavailable", { path: req.path, ...errorMeta(error) });
      }
      res.status(status).json({ error: error.message });
      return;
    }

    logger.error("[http] unhandled error", { method: req.method, path: req.path, ...errorMeta(error) });
    res.status(500).json({ error: "Internal server error" });
  };
}
