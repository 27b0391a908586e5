import type { Collection, Db, Document, WithId } from "mongodb";

export abstract class MongoDBRepository<T extends Document & { id: string }> {
  protected readonly db: Db;
  protected readonly collection: Collection<T>;

  constructor(db: Db, collectionName: string) {
    this.db = db;
    this.collection = db.collection<T>(collectionName);
    // Create indexes for efficient queries (fire and forget)
    this.ensureIndexes().catch((error) => {
      console.error(`[MongoDBRepository] Failed to create indexes for ${collectionName}:`, error);
    });
  }

  protected async ensureIndexes(): Promise<void> {
    // Unique index on the domain id; _id is never exposed
    await this.collection.createIndex({ id: 1 }, { unique: true });
    await this.ensureAdditionalIndexes();
  }

  protected async ensureAdditionalIndexes(): Promise<void> {}

  protected abstract toDomain(doc: WithId<T>): T;
}
