import type { Chunk, ChunkFailureUpdate, ChunkTranscriptionUpdate } from "../../../domain/entities/chunk";
import type {
  ChunkStorageTotals,
  IChunkRepository,
  SessionChunkTotals,
} from "../../../domain/interfaces/ichunk.repository";

export class InMemoryChunkRepository implements IChunkRepository {
  // keyed by `${sessionId}:${sequenceIndex}`
  private chunks = new Map<string, Chunk>();

  async swap(chunk: Chunk): Promise<{ chunk: Chunk; previous: Chunk | null }> {
    const slot = `${chunk.sessionId}:${chunk.sequenceIndex}`;
    const previous = this.chunks.get(slot) ?? null;
    this.chunks.set(slot, structuredClone(chunk));
    return { chunk: structuredClone(chunk), previous };
  }

  async findById(chunkId: string): Promise<Chunk | null> {
    const chunk = this.byId(chunkId);
    return chunk ? structuredClone(chunk) : null;
  }

  async findBySessionId(sessionId: string): Promise<Chunk[]> {
    return this.sessionChunks(sessionId).map((c) => structuredClone(c));
  }

  async findSequenceIndices(sessionId: string): Promise<number[]> {
    return this.sessionChunks(sessionId).map((c) => c.sequenceIndex);
  }

  async claimForTranscription(chunkId: string, staleProcessingBefore: Date): Promise<Chunk | null> {
    const chunk = this.byId(chunkId);
    if (!chunk || chunk.uploadStatus !== "uploaded") {
      return null;
    }
    const claimable =
      chunk.transcriptionStatus === "pending" ||
      (chunk.transcriptionStatus === "processing" &&
        chunk.processingStartedAt !== undefined &&
        chunk.processingStartedAt < staleProcessingBefore);
    if (!claimable) {
      return null;
    }

    const now = new Date();
    chunk.transcriptionStatus = "processing";
    chunk.processingStartedAt = now;
    chunk.updatedAt = now;
    return structuredClone(chunk);
  }

  async recordAttempt(chunkId: string, attempts: number, lastError: string): Promise<void> {
    const chunk = this.byId(chunkId);
    if (chunk) {
      chunk.transcriptionAttempts = attempts;
      chunk.lastError = lastError;
      chunk.updatedAt = new Date();
    }
  }

  async markTranscribed(chunkId: string, update: ChunkTranscriptionUpdate): Promise<Chunk | null> {
    const chunk = this.byId(chunkId);
    if (!chunk || chunk.transcriptionStatus !== "processing") {
      return null;
    }

    const now = new Date();
    chunk.transcriptionStatus = "completed";
    chunk.transcriptText = update.transcriptText;
    chunk.segments = structuredClone(update.segments);
    chunk.confidenceScore = update.confidenceScore;
    chunk.durationSeconds = update.durationSeconds;
    chunk.language = update.language;
    chunk.transcriptionAttempts = update.attempts;
    chunk.transcribedAt = now;
    chunk.updatedAt = now;
    delete chunk.lastError;
    delete chunk.processingStartedAt;
    return structuredClone(chunk);
  }

  async markTranscriptionFailed(chunkId: string, failure: ChunkFailureUpdate): Promise<Chunk | null> {
    const chunk = this.byId(chunkId);
    if (!chunk || chunk.transcriptionStatus !== "processing") {
      return null;
    }

    chunk.transcriptionStatus = "failed";
    chunk.lastError = failure.error;
    chunk.transcriptionAttempts = failure.attempts;
    if (failure.uploadFailed) {
      chunk.uploadStatus = "failed";
    }
    chunk.updatedAt = new Date();
    delete chunk.processingStartedAt;
    return structuredClone(chunk);
  }

  async findRecoverable(pendingBefore: Date, processingBefore: Date, limit: number): Promise<Chunk[]> {
    return [...this.chunks.values()]
      .filter(
        (c) =>
          c.uploadStatus === "uploaded" &&
          ((c.transcriptionStatus === "pending" && c.uploadedAt < pendingBefore) ||
            (c.transcriptionStatus === "processing" &&
              c.processingStartedAt !== undefined &&
              c.processingStartedAt < processingBefore))
      )
      .sort((a, b) => a.uploadedAt.getTime() - b.uploadedAt.getTime())
      .slice(0, limit)
      .map((c) => structuredClone(c));
  }

  async getSessionTotals(sessionId: string): Promise<SessionChunkTotals> {
    const chunks = this.sessionChunks(sessionId);
    return {
      chunkCount: chunks.length,
      totalDurationSeconds: chunks.reduce((sum, c) => sum + (c.durationSeconds ?? 0), 0),
    };
  }

  async getStorageTotals(): Promise<ChunkStorageTotals> {
    const chunks = [...this.chunks.values()];
    const totalBytes = chunks.reduce((sum, c) => sum + c.sizeBytes, 0);
    return {
      totalChunks: chunks.length,
      totalBytes,
      averageChunkBytes: chunks.length > 0 ? totalBytes / chunks.length : 0,
    };
  }

  async deleteBySessionId(sessionId: string): Promise<number> {
    const chunks = this.sessionChunks(sessionId);
    for (const chunk of chunks) {
      this.chunks.delete(`${chunk.sessionId}:${chunk.sequenceIndex}`);
    }
    return chunks.length;
  }

  private byId(chunkId: string): Chunk | undefined {
    for (const chunk of this.chunks.values()) {
      if (chunk.id === chunkId) {
        return chunk;
      }
    }
    return undefined;
  }

  private sessionChunks(sessionId: string): Chunk[] {
    return [...this.chunks.values()]
      .filter((c) => c.sessionId === sessionId)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }
}
