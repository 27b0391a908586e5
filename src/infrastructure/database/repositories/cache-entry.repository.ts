import { MongoServerError, type Db, type WithId } from "mongodb";
import type { CacheEntry } from "../../../domain/entities/cache-entry";
import type { CacheTotals, ICacheEntryRepository } from "../../../domain/interfaces/icache-entry.repository";
import { MongoDBRepository } from "../mongodb.repository";

const DUPLICATE_KEY = 11000;

export class CacheEntryRepository extends MongoDBRepository<CacheEntry> implements ICacheEntryRepository {
  constructor(db: Db) {
    super(db, "cacheEntries");
  }

  protected async ensureAdditionalIndexes(): Promise<void> {
    await this.collection.createIndex({ key: 1 }, { unique: true });
    await this.collection.createIndex({ createdAt: 1 });
  }

  protected toDomain(doc: WithId<CacheEntry>): CacheEntry {
    const { _id, ...entry } = doc;
    return entry;
  }

  async findByKey(key: string): Promise<CacheEntry | null> {
    const doc = await this.collection.findOne({ key });
    return doc ? this.toDomain(doc) : null;
  }

  async insertIfAbsent(entry: CacheEntry): Promise<{ entry: CacheEntry; inserted: boolean }> {
    try {
      await this.collection.insertOne({ ...entry });
      return { entry, inserted: true };
    } catch (error) {
      if (!(error instanceof MongoServerError) || error.code !== DUPLICATE_KEY) {
        throw error;
      }
      const existing = await this.findByKey(entry.key);
      if (!existing) {
        throw error;
      }
      return { entry: existing, inserted: false };
    }
  }

  async recordHit(key: string, accessedAt: Date): Promise<CacheEntry | null> {
    const doc = await this.collection.findOneAndUpdate(
      { key },
      { $inc: { hitCount: 1 }, $set: { lastAccessedAt: accessedAt } },
      { returnDocument: "after" }
    );
    return doc ? this.toDomain(doc) : null;
  }

  async findCreatedBefore(cutoff: Date): Promise<CacheEntry[]> {
    const docs = await this.collection.find({ createdAt: { $lt: cutoff } }).sort({ createdAt: 1 }).toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async deleteByKey(key: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ key });
    return result.deletedCount > 0;
  }

  async getTotals(): Promise<CacheTotals> {
    const [totals] = await this.collection
      .aggregate<CacheTotals>([
        {
          $group: {
            _id: null,
            totalEntries: { $sum: 1 },
            totalBytes: { $sum: "$payloadRef.sizeBytes" },
            totalHits: { $sum: "$hitCount" },
            oldestCreatedAt: { $min: "$createdAt" },
            newestCreatedAt: { $max: "$createdAt" },
          },
        },
        { $project: { _id: 0 } },
      ])
      .toArray();
    return totals ?? { totalEntries: 0, totalBytes: 0, totalHits: 0 };
  }
}
