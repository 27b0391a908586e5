import type { Chunk, ChunkFailureUpdate, ChunkTranscriptionUpdate } from "../entities/chunk";

export interface SessionChunkTotals {
  chunkCount: number;
  totalDurationSeconds: number;
}

export interface ChunkStorageTotals {
  totalChunks: number;
  totalBytes: number;
  averageChunkBytes: number;
}

export interface IChunkRepository {
  /**
   * Atomically replaces the row for (sessionId, sequenceIndex) with `chunk`,
   * inserting it when absent. Returns the row that was replaced, if any.
   */
  swap(chunk: Chunk): Promise<{ chunk: Chunk; previous: Chunk | null }>;
  findById(chunkId: string): Promise<Chunk | null>;
  /** Ordered by ascending sequenceIndex. */
  findBySessionId(sessionId: string): Promise<Chunk[]>;
  findSequenceIndices(sessionId: string): Promise<number[]>;
  /**
   * pending -> processing. A processing claim started before
   * `staleProcessingBefore` may be taken over.
   */
  claimForTranscription(chunkId: string, staleProcessingBefore: Date): Promise<Chunk | null>;
  recordAttempt(chunkId: string, attempts: number, lastError: string): Promise<void>;
  /** processing -> completed. Null if the chunk was replaced or released meanwhile. */
  markTranscribed(chunkId: string, update: ChunkTranscriptionUpdate): Promise<Chunk | null>;
  markTranscriptionFailed(chunkId: string, failure: ChunkFailureUpdate): Promise<Chunk | null>;
  findRecoverable(pendingBefore: Date, processingBefore: Date, limit: number): Promise<Chunk[]>;
  getSessionTotals(sessionId: string): Promise<SessionChunkTotals>;
  getStorageTotals(): Promise<ChunkStorageTotals>;
  deleteBySessionId(sessionId: string): Promise<number>;
}
