import type { AggregatedTranscript } from "../../domain/entities/session-transcript";
import { NotFoundError, SessionFailedError } from "../../domain/errors/app.errors";
import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { ISessionTranscriptRepository } from "../../domain/interfaces/isession-transcript.repository";
import type { TranscriptAggregator } from "../services/transcript.aggregator";

export class AggregateSessionUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private chunkRepository: IChunkRepository,
    private sessionTranscriptRepository: ISessionTranscriptRepository,
    private aggregator: TranscriptAggregator
  ) {}

  /**
   * Completed sessions answer with the transcript captured at completion, so
   * chunks re-uploaded afterwards do not change it. Other sessions are merged
   * from their current chunks.
   */
  async execute(sessionId: string): Promise<AggregatedTranscript> {
    const chunks = await this.chunkRepository.findBySessionId(sessionId);
    if (chunks.length === 0) {
      throw new NotFoundError(`No chunks found for session ${sessionId}`);
    }

    const session = await this.sessionRepository.findById(sessionId);
    if (session?.status === "failed") {
      throw new SessionFailedError(sessionId, session.failureReason);
    }

    if (session?.status === "completed") {
      const stored = await this.sessionTranscriptRepository.findBySessionId(sessionId);
      if (stored) {
        return stored;
      }
      console.warn(`[AggregateSession] Completed session ${sessionId} has no stored transcript, merging chunks`);
    }

    return this.aggregator.aggregate(sessionId, chunks);
  }
}
