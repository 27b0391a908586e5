import { TerminalSessionStatuses } from "../../domain/enums/session.status";
import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";
import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { ISessionTranscriptRepository } from "../../domain/interfaces/isession-transcript.repository";

export interface CleanupExpiredSessionsUseCaseParams {
  maxAgeDays: number;
  limit?: number;
  now?: Date;
}

export interface CleanupExpiredSessionsResult {
  deletedSessions: number;
  deletedChunks: number;
  deletedBlobs: number;
  errors: number;
}

/**
 * Deletes finished sessions older than the retention period, together with
 * their chunks, blobs and stored transcript.
 */
export class CleanupExpiredSessionsUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private chunkRepository: IChunkRepository,
    private transcriptRepository: ISessionTranscriptRepository,
    private blobStorage: IBlobStorage
  ) {}

  async execute(params: CleanupExpiredSessionsUseCaseParams): Promise<CleanupExpiredSessionsResult> {
    const { maxAgeDays, limit = 100, now = new Date() } = params;
    const cutoff = new Date(now.getTime() - maxAgeDays * 24 * 60 * 60 * 1000);

    const sessions = await this.sessionRepository.findExpired(TerminalSessionStatuses, cutoff, limit);
    const result: CleanupExpiredSessionsResult = { deletedSessions: 0, deletedChunks: 0, deletedBlobs: 0, errors: 0 };

    for (const session of sessions) {
      try {
        result.deletedBlobs += await this.blobStorage.deletePrefix(`sessions/${session.id}/`);
        result.deletedChunks += await this.chunkRepository.deleteBySessionId(session.id);
        await this.transcriptRepository.deleteBySessionId(session.id);
        if (await this.sessionRepository.delete(session.id)) {
          result.deletedSessions++;
        }
      } catch (error) {
        console.error(`[CleanupExpiredSessions] Error deleting session ${session.id}:`, error);
        result.errors++;
      }
    }

    if (sessions.length > 0) {
      console.log(
        `[CleanupExpiredSessions] Deleted ${result.deletedSessions} sessions, ${result.deletedChunks} chunks, ${result.deletedBlobs} blobs (${result.errors} errors)`
      );
    }

    return result;
  }
}
