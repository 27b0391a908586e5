import type { SessionTranscript } from "../../../domain/entities/session-transcript";
import { ConflictError } from "../../../domain/errors/app.errors";
import type { ISessionTranscriptRepository } from "../../../domain/interfaces/isession-transcript.repository";

export class InMemorySessionTranscriptRepository implements ISessionTranscriptRepository {
  private transcripts = new Map<string, SessionTranscript>();

  async create(transcript: SessionTranscript): Promise<SessionTranscript> {
    if (this.transcripts.has(transcript.sessionId)) {
      throw new ConflictError(`Session ${transcript.sessionId} already has a transcript`);
    }
    this.transcripts.set(transcript.sessionId, structuredClone(transcript));
    return transcript;
  }

  async findBySessionId(sessionId: string): Promise<SessionTranscript | null> {
    const transcript = this.transcripts.get(sessionId);
    return transcript ? structuredClone(transcript) : null;
  }

  async deleteBySessionId(sessionId: string): Promise<boolean> {
    return this.transcripts.delete(sessionId);
  }
}
