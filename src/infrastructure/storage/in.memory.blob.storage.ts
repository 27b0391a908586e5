import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";

export class InMemoryBlobStorage implements IBlobStorage {
  private blobs = new Map<string, { data: Buffer; contentType: string }>();

  async put(key: string, data: Buffer, contentType: string): Promise<void> {
    this.blobs.set(key, { data: Buffer.from(data), contentType });
  }

  async get(key: string): Promise<Buffer | null> {
    const blob = this.blobs.get(key);
    return blob ? Buffer.from(blob.data) : null;
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  async deletePrefix(prefix: string): Promise<number> {
    let deleted = 0;
    for (const key of [...this.blobs.keys()]) {
      if (key.startsWith(prefix)) {
        this.blobs.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  keys(): string[] {
    return [...this.blobs.keys()].sort();
  }
}
