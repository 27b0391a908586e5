import type { SessionTranscript } from "../entities/session-transcript";

export interface ISessionTranscriptRepository {
  /** Throws ConflictError if the session already has a transcript. */
  create(transcript: SessionTranscript): Promise<SessionTranscript>;
  findBySessionId(sessionId: string): Promise<SessionTranscript | null>;
  deleteBySessionId(sessionId: string): Promise<boolean>;
}
