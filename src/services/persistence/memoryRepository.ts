import type { NewTurn, Session, Turn } from "../orchestration/types";
import type { Report } from "../report/types";
import { SessionFinishedError, SessionNotFoundError, type SessionRepository } from "./types";

/** Map-backed repository. Records are copied on the way in and out. */
export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, Session>();
  private readonly turns = new Map<string, Turn[]>();
  private readonly reports = new Map<string, Report>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(session: Session): Promise<void> {
    if (this.sessions.has(session.id)) {
      throw new Error(`Session already exists: ${session.id}`);
    }
    this.sessions.set(session.id, structuredClone(session));
    this.turns.set(session.id, []);
  }

  async get(id: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  async save(session: Session): Promise<void> {
    const stored = this.sessions.get(session.id);
    if (!stored) throw new SessionNotFoundError(session.id);
    if (stored.status === "finished") throw new SessionFinishedError(session.id);
    this.sessions.set(session.id, structuredClone({ ...session, updated_at: this.now().toISOString() }));
  }

  async appendTurn(sessionId: string, turn: NewTurn): Promise<Turn> {
    const list = this.turns.get(sessionId);
    if (!list) throw new SessionNotFoundError(sessionId);
    const stored: Turn = { ...structuredClone(turn), seq: list.length + 1, created_at: this.now().toISOString() };
    list.push(stored);
    return structuredClone(stored);
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    const list = this.turns.get(sessionId);
    if (!list) throw new SessionNotFoundError(sessionId);
    return structuredClone(list);
  }

  async saveReport(sessionId: string, report: Report): Promise<void> {
    if (!this.sessions.has(sessionId)) throw new SessionNotFoundError(sessionId);
    this.reports.set(sessionId, structuredClone(report));
  }

  async getReport(sessionId: string): Promise<Report | null> {
    const report = this.reports.get(sessionId);
    return report ? structuredClone(report) : null;
  }
}
