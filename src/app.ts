import express from "express";
import type { Logger } from "./config/logger";
import { createErrorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { createSessionsRouter } from "./routes/sessions";
import type { InterviewService } from "./services/orchestration/interviewService";

export type AppDeps = {
  service: InterviewService;
  logger: Logger;
  /** Comma-separated CORS origins. */
  frontendOrigin?: string;
};

export function createApp(deps: AppDeps) {
  const allowedOrigins = (deps.frontendOrigin ?? "http://localhost:3000")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/sessions", createSessionsRouter(deps.service));
  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.logger));
  return app;
}
