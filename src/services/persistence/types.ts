import type { NewTurn, Session, Turn } from "../orchestration/types";
import type { Report } from "../report/types";

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

/** A finished session only accepts report caching. */
export class SessionFinishedError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} is finished and can no longer change`);
    this.name = "SessionFinishedError";
  }
}

export interface SessionRepository {
  create(session: Session): Promise<void>;
  get(id: string): Promise<Session | null>;
  /** Persist flow state and status. Rejects with SessionFinishedError once the stored session is finished. */
  save(session: Session): Promise<void>;
  /** Append a turn with the next sequence number. */
  appendTurn(sessionId: string, turn: NewTurn): Promise<Turn>;
  listTurns(sessionId: string): Promise<Turn[]>;
  saveReport(sessionId: string, report: Report): Promise<void>;
  getReport(sessionId: string): Promise<Report | null>;
}
