import { MongoServerError, type Db, type WithId } from "mongodb";
import type { SessionTranscript } from "../../../domain/entities/session-transcript";
import { ConflictError } from "../../../domain/errors/app.errors";
import type { ISessionTranscriptRepository } from "../../../domain/interfaces/isession-transcript.repository";
import { MongoDBRepository } from "../mongodb.repository";

const DUPLICATE_KEY = 11000;

export class SessionTranscriptRepository
  extends MongoDBRepository<SessionTranscript>
  implements ISessionTranscriptRepository
{
  constructor(db: Db) {
    super(db, "sessionTranscripts");
  }

  protected async ensureAdditionalIndexes(): Promise<void> {
    await this.collection.createIndex({ sessionId: 1 }, { unique: true });
  }

  protected toDomain(doc: WithId<SessionTranscript>): SessionTranscript {
    const { _id, ...transcript } = doc;
    return transcript;
  }

  async create(transcript: SessionTranscript): Promise<SessionTranscript> {
    try {
      await this.collection.insertOne({ ...transcript });
      return transcript;
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        throw new ConflictError(`Session ${transcript.sessionId} already has a transcript`);
      }
      throw error;
    }
  }

  async findBySessionId(sessionId: string): Promise<SessionTranscript | null> {
    const doc = await this.collection.findOne({ sessionId });
    return doc ? this.toDomain(doc) : null;
  }

  async deleteBySessionId(sessionId: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ sessionId });
    return result.deletedCount > 0;
  }
}
