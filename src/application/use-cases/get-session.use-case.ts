import type { Chunk } from "../../domain/entities/chunk";
import type { Session } from "../../domain/entities/session";
import { NotFoundError } from "../../domain/errors/app.errors";
import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import { findMissingIndices } from "../../domain/utils/gaps";

export interface SessionSummary {
  session: Session;
  chunks: Chunk[];
  uploadedChunks: number;
  transcribedChunks: number;
  failedChunks: number;
  pendingChunks: number;
  missingIndices: number[];
}

export class GetSessionUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private chunkRepository: IChunkRepository
  ) {}

  async execute(sessionId: string): Promise<SessionSummary> {
    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }

    const chunks = await this.chunkRepository.findBySessionId(sessionId);

    return {
      session,
      chunks,
      uploadedChunks: chunks.filter((c) => c.uploadStatus === "uploaded").length,
      transcribedChunks: chunks.filter((c) => c.transcriptionStatus === "completed").length,
      failedChunks: chunks.filter((c) => c.uploadStatus === "failed" || c.transcriptionStatus === "failed").length,
      pendingChunks: chunks.filter((c) => c.transcriptionStatus === "pending" || c.transcriptionStatus === "processing").length,
      missingIndices: findMissingIndices(chunks.map((c) => c.sequenceIndex)),
    };
  }
}
