import type { Session, SessionProgressUpdate, SessionTransitionDetails } from "../../../domain/entities/session";
import type { SessionStatus } from "../../../domain/enums/session.status";
import type { ISessionRepository } from "../../../domain/interfaces/isession.repository";

export class InMemorySessionRepository implements ISessionRepository {
  private sessions = new Map<string, Session>();

  async findById(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async ensureExists(sessionId: string): Promise<{ session: Session; created: boolean }> {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return { session: structuredClone(existing), created: false };
    }

    const now = new Date();
    const session: Session = {
      id: sessionId,
      status: "open",
      chunkCount: 0,
      totalDurationSeconds: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(sessionId, session);
    return { session: structuredClone(session), created: true };
  }

  async markReceiving(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (session?.status === "open") {
      session.status = "receiving";
      session.updatedAt = new Date();
    }
  }

  async updateProgress(sessionId: string, progress: SessionProgressUpdate): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    session.chunkCount = progress.chunkCount;
    session.totalDurationSeconds = progress.totalDurationSeconds;
    if (progress.totalChunksExpected !== undefined) {
      session.totalChunksExpected = progress.totalChunksExpected;
    }
    session.updatedAt = new Date();
    return structuredClone(session);
  }

  async transitionStatus(
    sessionId: string,
    from: readonly SessionStatus[],
    to: SessionStatus,
    details: SessionTransitionDetails = {}
  ): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    if (!session || !from.includes(session.status)) {
      return null;
    }
    Object.assign(session, details, { status: to, updatedAt: new Date() });
    return structuredClone(session);
  }

  async findExpired(statuses: readonly SessionStatus[], createdBefore: Date, limit: number): Promise<Session[]> {
    return [...this.sessions.values()]
      .filter((s) => statuses.includes(s.status) && s.createdAt < createdBefore)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit)
      .map((s) => structuredClone(s));
  }

  async count(status?: SessionStatus): Promise<number> {
    return [...this.sessions.values()].filter((s) => !status || s.status === status).length;
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}
