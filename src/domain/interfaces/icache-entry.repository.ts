import type { CacheEntry } from "../entities/cache-entry";

export interface CacheTotals {
  totalEntries: number;
  totalBytes: number;
  totalHits: number;
  oldestCreatedAt?: Date;
  newestCreatedAt?: Date;
}

export interface ICacheEntryRepository {
  findByKey(key: string): Promise<CacheEntry | null>;
  /** Keeps the first entry written for a key; `inserted` is false when one already existed. */
  insertIfAbsent(entry: CacheEntry): Promise<{ entry: CacheEntry; inserted: boolean }>;
  recordHit(key: string, accessedAt: Date): Promise<CacheEntry | null>;
  findCreatedBefore(cutoff: Date): Promise<CacheEntry[]>;
  deleteByKey(key: string): Promise<boolean>;
  getTotals(): Promise<CacheTotals>;
}
