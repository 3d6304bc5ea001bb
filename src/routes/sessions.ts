import { Router } from "express";
import { z } from "zod";
import { parseBody } from "../middlewares/validate";
import type { InterviewService } from "../services/orchestration/interviewService";
import { HttpError } from "../utils/httpError";

const startSessionSchema = z.object({
  company_name: z.string().trim().min(1, "company_name is required"),
  job_title: z.string().trim().min(1, "job_title is required"),
  job_description: z.string().default(""),
  resume: z.string().default(""),
  competency_hints: z.array(z.string()).default([]),
  language: z.string().default("en"),
  difficulty: z.enum(["easy", "normal", "hard"]).default("normal"),
  persona: z.enum(["team_lead", "executive"]).default("team_lead")
});

const submitAnswerSchema = z.object({
  answer: z.string().trim().min(1, "answer is required"),
  question: z.string().optional()
});

export function createSessionsRouter(service: InterviewService): Router {
  const router = Router();

  router.post("/", async (req, res, next) => {
    try {
      const context = parseBody(startSessionSchema, req);
      const result = await service.startSession(context);
      res.status(201).json(result);
    } catch (e) {
      next(e);
    }
  });

  router.post("/:id/answers", async (req, res, next) => {
    try {
      const body = parseBody(submitAnswerSchema, req);
      const result = await service.submitAnswer(req.params.id, body.answer, body.question);
      res.json(result);
    } catch (e) {
      next(e);
    }
  });

  router.post("/:id/next", async (req, res, next) => {
    try {
      res.json(await service.nextQuestion(req.params.id));
    } catch (e) {
      next(e);
    }
  });

  router.post("/:id/finish", async (req, res, next) => {
    try {
      res.json(await service.finishSession(req.params.id));
    } catch (e) {
      next(e);
    }
  });

  router.get("/:id/report", async (req, res, next) => {
    try {
      const report = await service.getReport(req.params.id);
      if (!report) {
        throw new HttpError(404, "Report not available; finish the session first");
      }
      res.json(report);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
