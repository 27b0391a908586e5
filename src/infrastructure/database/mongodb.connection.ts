import { MongoClient, type Db, type MongoClientOptions } from "mongodb";

// Unset optional fields are left out of stored documents instead of written as null
export const MONGO_CLIENT_OPTIONS = { ignoreUndefined: true } satisfies MongoClientOptions;

export class MongoDBConnection {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  constructor(
    private readonly uri: string,
    private readonly dbName: string
  ) {}

  async connect(): Promise<Db> {
    if (this.db) {
      return this.db;
    }

    try {
      this.client = new MongoClient(this.uri, MONGO_CLIENT_OPTIONS);
      await this.client.connect();
      this.db = this.client.db(this.dbName);
      console.log(`Connected to MongoDB: ${this.dbName}`);
      return this.db;
    } catch (error) {
      console.error("Failed to connect to MongoDB:", error);
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      console.log("MongoDB connection closed");
    }
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error("MongoDB not connected. Call connect() first.");
    }
    return this.db;
  }
}
