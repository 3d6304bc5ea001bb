/**
 * PostgreSQL session store. Rows are validated on read; JSON columns hold the
 * context, plan, flow state, dossiers and reports.
 */

import type { z } from "zod";
import type { NewTurn, Session, Turn } from "../orchestration/types";
import type { Report } from "../report/types";
import { reportSchema, sessionRowSchema, turnFromRow, turnRowSchema } from "./schemas";
import { SessionFinishedError, SessionNotFoundError, type SessionRepository } from "./types";

export type QueryResultLike = { rows: unknown[]; rowCount: number | null };

/** The part of a pg Pool or client the repository needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, what: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const issueText = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid ${what} row: ${issueText}`);
  }
  return parsed.data;
}

export class PgSessionRepository implements SessionRepository {
  constructor(private readonly db: Queryable) {}

  async create(session: Session): Promise<void> {
    await this.db.query(
      `INSERT INTO interview_sessions (id, context_json, plan_json, flow_json, status, plan_source, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        session.id,
        JSON.stringify(session.context),
        JSON.stringify(session.plan),
        JSON.stringify(session.flow),
        session.status,
        session.plan_source,
        session.created_at,
        session.updated_at
      ]
    );
  }

  async get(id: string): Promise<Session | null> {
    const result = await this.db.query(
      `SELECT id, context_json, plan_json, flow_json, status, plan_source, created_at, updated_at
       FROM interview_sessions WHERE id = $1`,
      [id]
    );
    if (result.rows.length === 0) return null;
    const row = parseRow(sessionRowSchema, result.rows[0], "interview_sessions");
    return {
      id: row.id,
      context: row.context_json,
      plan: row.plan_json,
      flow: row.flow_json,
      status: row.status,
      plan_source: row.plan_source,
      created_at: row.created_at,
      updated_at: row.updated_at
    };
  }

  async save(session: Session): Promise<void> {
    const result = await this.db.query(
      `UPDATE interview_sessions
       SET flow_json = $2, status = $3, updated_at = NOW()
       WHERE id = $1 AND status <> 'finished'`,
      [session.id, JSON.stringify(session.flow), session.status]
    );
    if (result.rowCount === 1) return;
    const existing = await this.get(session.id);
    if (!existing) throw new SessionNotFoundError(session.id);
    throw new SessionFinishedError(session.id);
  }

  async appendTurn(sessionId: string, turn: NewTurn): Promise<Turn> {
    const result = await this.db.query(
      `INSERT INTO interview_turns (session_id, seq, role, label, text, question_type, intent, dossier_json)
       SELECT $1, COALESCE(MAX(seq), 0) + 1, $2, $3, $4, $5, $6, $7
       FROM interview_turns WHERE session_id = $1
       RETURNING seq, role, label, text, question_type, intent, dossier_json, created_at`,
      [
        sessionId,
        turn.role,
        turn.label,
        turn.text,
        turn.question_type,
        turn.intent,
        turn.dossier === null ? null : JSON.stringify(turn.dossier)
      ]
    );
    if (result.rows.length === 0) throw new SessionNotFoundError(sessionId);
    return turnFromRow(parseRow(turnRowSchema, result.rows[0], "interview_turns"));
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    const result = await this.db.query(
      `SELECT seq, role, label, text, question_type, intent, dossier_json, created_at
       FROM interview_turns WHERE session_id = $1 ORDER BY seq ASC`,
      [sessionId]
    );
    return result.rows.map((row) => turnFromRow(parseRow(turnRowSchema, row, "interview_turns")));
  }

  async saveReport(sessionId: string, report: Report): Promise<void> {
    await this.db.query(
      `INSERT INTO interview_reports (session_id, report_json)
       VALUES ($1, $2)
       ON CONFLICT (session_id) DO UPDATE SET report_json = EXCLUDED.report_json, created_at = NOW()`,
      [sessionId, JSON.stringify(report)]
    );
  }

  async getReport(sessionId: string): Promise<Report | null> {
    const result = await this.db.query("SELECT report_json FROM interview_reports WHERE session_id = $1", [
      sessionId
    ]);
    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    const payload = typeof row === "object" && row !== null && "report_json" in row ? row.report_json : undefined;
    return parseRow(reportSchema, payload, "interview_reports");
  }
}
