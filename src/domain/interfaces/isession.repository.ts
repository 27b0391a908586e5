import type { Session, SessionProgressUpdate, SessionTransitionDetails } from "../entities/session";
import type { SessionStatus } from "../enums/session.status";

export interface ISessionRepository {
  findById(sessionId: string): Promise<Session | null>;
  /** Creates the session in status "open" unless it already exists. */
  ensureExists(sessionId: string): Promise<{ session: Session; created: boolean }>;
  /** open -> receiving; no-op in any other status. */
  markReceiving(sessionId: string): Promise<void>;
  updateProgress(sessionId: string, progress: SessionProgressUpdate): Promise<Session | null>;
  /**
   * Compare-and-set on status. Returns null when the session is not in one of
   * `from`, which is how concurrent callers learn they lost the race.
   */
  transitionStatus(
    sessionId: string,
    from: readonly SessionStatus[],
    to: SessionStatus,
    details?: SessionTransitionDetails
  ): Promise<Session | null>;
  findExpired(statuses: readonly SessionStatus[], createdBefore: Date, limit: number): Promise<Session[]>;
  count(status?: SessionStatus): Promise<number>;
  delete(sessionId: string): Promise<boolean>;
}
