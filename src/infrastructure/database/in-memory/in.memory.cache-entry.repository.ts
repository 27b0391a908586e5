import type { CacheEntry } from "../../../domain/entities/cache-entry";
import type { CacheTotals, ICacheEntryRepository } from "../../../domain/interfaces/icache-entry.repository";

export class InMemoryCacheEntryRepository implements ICacheEntryRepository {
  private entries = new Map<string, CacheEntry>();

  async findByKey(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    return entry ? structuredClone(entry) : null;
  }

  async insertIfAbsent(entry: CacheEntry): Promise<{ entry: CacheEntry; inserted: boolean }> {
    const existing = this.entries.get(entry.key);
    if (existing) {
      return { entry: structuredClone(existing), inserted: false };
    }
    this.entries.set(entry.key, structuredClone(entry));
    return { entry: structuredClone(entry), inserted: true };
  }

  async recordHit(key: string, accessedAt: Date): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    entry.hitCount++;
    entry.lastAccessedAt = accessedAt;
    return structuredClone(entry);
  }

  async findCreatedBefore(cutoff: Date): Promise<CacheEntry[]> {
    return [...this.entries.values()]
      .filter((e) => e.createdAt < cutoff)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((e) => structuredClone(e));
  }

  async deleteByKey(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async getTotals(): Promise<CacheTotals> {
    const entries = [...this.entries.values()];
    const created = entries.map((e) => e.createdAt.getTime());
    return {
      totalEntries: entries.length,
      totalBytes: entries.reduce((sum, e) => sum + e.payloadRef.sizeBytes, 0),
      totalHits: entries.reduce((sum, e) => sum + e.hitCount, 0),
      oldestCreatedAt: created.length > 0 ? new Date(Math.min(...created)) : undefined,
      newestCreatedAt: created.length > 0 ? new Date(Math.max(...created)) : undefined,
    };
  }
}
