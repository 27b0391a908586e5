import type { Db, WithId } from "mongodb";
import type { Session, SessionProgressUpdate, SessionTransitionDetails } from "../../../domain/entities/session";
import type { SessionStatus } from "../../../domain/enums/session.status";
import type { ISessionRepository } from "../../../domain/interfaces/isession.repository";
import { MongoDBRepository } from "../mongodb.repository";

export class SessionRepository extends MongoDBRepository<Session> implements ISessionRepository {
  constructor(db: Db) {
    super(db, "sessions");
  }

  protected async ensureAdditionalIndexes(): Promise<void> {
    // Retention sweeps look up finished sessions by age
    await this.collection.createIndex({ status: 1, createdAt: 1 });
  }

  protected toDomain(doc: WithId<Session>): Session {
    const { _id, ...session } = doc;
    return session;
  }

  async findById(sessionId: string): Promise<Session | null> {
    const doc = await this.collection.findOne({ id: sessionId });
    return doc ? this.toDomain(doc) : null;
  }

  async ensureExists(sessionId: string): Promise<{ session: Session; created: boolean }> {
    const now = new Date();
    const fresh: Session = {
      id: sessionId,
      status: "open",
      chunkCount: 0,
      totalDurationSeconds: 0,
      createdAt: now,
      updatedAt: now,
    };

    const before = await this.collection.findOneAndUpdate(
      { id: sessionId },
      { $setOnInsert: { ...fresh } },
      { upsert: true, returnDocument: "before" }
    );

    return before ? { session: this.toDomain(before), created: false } : { session: fresh, created: true };
  }

  async markReceiving(sessionId: string): Promise<void> {
    await this.collection.updateOne(
      { id: sessionId, status: "open" },
      { $set: { status: "receiving", updatedAt: new Date() } }
    );
  }

  async updateProgress(sessionId: string, progress: SessionProgressUpdate): Promise<Session | null> {
    const fields: Partial<Session> = {
      chunkCount: progress.chunkCount,
      totalDurationSeconds: progress.totalDurationSeconds,
      updatedAt: new Date(),
    };
    if (progress.totalChunksExpected !== undefined) {
      fields.totalChunksExpected = progress.totalChunksExpected;
    }

    const doc = await this.collection.findOneAndUpdate(
      { id: sessionId },
      { $set: fields },
      { returnDocument: "after" }
    );
    return doc ? this.toDomain(doc) : null;
  }

  async transitionStatus(
    sessionId: string,
    from: readonly SessionStatus[],
    to: SessionStatus,
    details: SessionTransitionDetails = {}
  ): Promise<Session | null> {
    const fields: Partial<Session> = { ...details, status: to, updatedAt: new Date() };
    const doc = await this.collection.findOneAndUpdate(
      { id: sessionId, status: { $in: [...from] } },
      { $set: fields },
      { returnDocument: "after" }
    );
    return doc ? this.toDomain(doc) : null;
  }

  async findExpired(statuses: readonly SessionStatus[], createdBefore: Date, limit: number): Promise<Session[]> {
    const docs = await this.collection
      .find({ status: { $in: [...statuses] }, createdAt: { $lt: createdBefore } })
      .sort({ createdAt: 1 })
      .limit(limit)
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async count(status?: SessionStatus): Promise<number> {
    return this.collection.countDocuments(status ? { status } : {});
  }

  async delete(sessionId: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ id: sessionId });
    return result.deletedCount > 0;
  }
}
