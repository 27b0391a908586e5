import type { Db, WithId } from "mongodb";
import type { Chunk, ChunkFailureUpdate, ChunkTranscriptionUpdate } from "../../../domain/entities/chunk";
import type {
  ChunkStorageTotals,
  IChunkRepository,
  SessionChunkTotals,
} from "../../../domain/interfaces/ichunk.repository";
import { MongoDBRepository } from "../mongodb.repository";

export class ChunkRepository extends MongoDBRepository<Chunk> implements IChunkRepository {
  constructor(db: Db) {
    super(db, "chunks");
  }

  protected async ensureAdditionalIndexes(): Promise<void> {
    // One row per (session, index); swap() relies on it
    await this.collection.createIndex({ sessionId: 1, sequenceIndex: 1 }, { unique: true });
    await this.collection.createIndex({ transcriptionStatus: 1, uploadedAt: 1 });
  }

  protected toDomain(doc: WithId<Chunk>): Chunk {
    const { _id, ...chunk } = doc;
    return chunk;
  }

  async swap(chunk: Chunk): Promise<{ chunk: Chunk; previous: Chunk | null }> {
    const previous = await this.collection.findOneAndReplace(
      { sessionId: chunk.sessionId, sequenceIndex: chunk.sequenceIndex },
      { ...chunk },
      { upsert: true, returnDocument: "before" }
    );
    return { chunk, previous: previous ? this.toDomain(previous) : null };
  }

  async findById(chunkId: string): Promise<Chunk | null> {
    const doc = await this.collection.findOne({ id: chunkId });
    return doc ? this.toDomain(doc) : null;
  }

  async findBySessionId(sessionId: string): Promise<Chunk[]> {
    const docs = await this.collection.find({ sessionId }).sort({ sequenceIndex: 1 }).toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findSequenceIndices(sessionId: string): Promise<number[]> {
    const docs = await this.collection
      .find({ sessionId }, { projection: { sequenceIndex: 1 } })
      .sort({ sequenceIndex: 1 })
      .toArray();
    return docs.map((doc) => doc.sequenceIndex);
  }

  async claimForTranscription(chunkId: string, staleProcessingBefore: Date): Promise<Chunk | null> {
    const now = new Date();
    const doc = await this.collection.findOneAndUpdate(
      {
        id: chunkId,
        uploadStatus: "uploaded",
        $or: [
          { transcriptionStatus: "pending" },
          { transcriptionStatus: "processing", processingStartedAt: { $lt: staleProcessingBefore } },
        ],
      },
      { $set: { transcriptionStatus: "processing", processingStartedAt: now, updatedAt: now } },
      { returnDocument: "after" }
    );
    return doc ? this.toDomain(doc) : null;
  }

  async recordAttempt(chunkId: string, attempts: number, lastError: string): Promise<void> {
    await this.collection.updateOne(
      { id: chunkId },
      { $set: { transcriptionAttempts: attempts, lastError, updatedAt: new Date() } }
    );
  }

  async markTranscribed(chunkId: string, update: ChunkTranscriptionUpdate): Promise<Chunk | null> {
    const now = new Date();
    const doc = await this.collection.findOneAndUpdate(
      { id: chunkId, transcriptionStatus: "processing" },
      {
        $set: {
          transcriptionStatus: "completed",
          transcriptText: update.transcriptText,
          segments: update.segments,
          confidenceScore: update.confidenceScore,
          durationSeconds: update.durationSeconds,
          language: update.language,
          transcriptionAttempts: update.attempts,
          transcribedAt: now,
          updatedAt: now,
        },
        $unset: { lastError: "", processingStartedAt: "" },
      },
      { returnDocument: "after" }
    );
    return doc ? this.toDomain(doc) : null;
  }

  async markTranscriptionFailed(chunkId: string, failure: ChunkFailureUpdate): Promise<Chunk | null> {
    const fields: Partial<Chunk> = {
      transcriptionStatus: "failed",
      lastError: failure.error,
      transcriptionAttempts: failure.attempts,
      updatedAt: new Date(),
    };
    if (failure.uploadFailed) {
      fields.uploadStatus = "failed";
    }

    const doc = await this.collection.findOneAndUpdate(
      { id: chunkId, transcriptionStatus: "processing" },
      { $set: fields, $unset: { processingStartedAt: "" } },
      { returnDocument: "after" }
    );
    return doc ? this.toDomain(doc) : null;
  }

  async findRecoverable(pendingBefore: Date, processingBefore: Date, limit: number): Promise<Chunk[]> {
    const docs = await this.collection
      .find({
        uploadStatus: "uploaded",
        $or: [
          { transcriptionStatus: "pending", uploadedAt: { $lt: pendingBefore } },
          { transcriptionStatus: "processing", processingStartedAt: { $lt: processingBefore } },
        ],
      })
      .sort({ uploadedAt: 1 })
      .limit(limit)
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async getSessionTotals(sessionId: string): Promise<SessionChunkTotals> {
    const [totals] = await this.collection
      .aggregate<SessionChunkTotals>([
        { $match: { sessionId } },
        {
          $group: {
            _id: null,
            chunkCount: { $sum: 1 },
            totalDurationSeconds: { $sum: { $ifNull: ["$durationSeconds", 0] } },
          },
        },
        { $project: { _id: 0, chunkCount: 1, totalDurationSeconds: 1 } },
      ])
      .toArray();
    return totals ?? { chunkCount: 0, totalDurationSeconds: 0 };
  }

  async getStorageTotals(): Promise<ChunkStorageTotals> {
    const [totals] = await this.collection
      .aggregate<{ totalChunks: number; totalBytes: number }>([
        { $group: { _id: null, totalChunks: { $sum: 1 }, totalBytes: { $sum: "$sizeBytes" } } },
      ])
      .toArray();

    if (!totals || totals.totalChunks === 0) {
      return { totalChunks: 0, totalBytes: 0, averageChunkBytes: 0 };
    }
    return {
      totalChunks: totals.totalChunks,
      totalBytes: totals.totalBytes,
      averageChunkBytes: totals.totalBytes / totals.totalChunks,
    };
  }

  async deleteBySessionId(sessionId: string): Promise<number> {
    const result = await this.collection.deleteMany({ sessionId });
    return result.deletedCount;
  }
}
