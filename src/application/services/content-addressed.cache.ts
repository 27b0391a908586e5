import { randomUUID } from "crypto";
import type { CacheEntry } from "../../domain/entities/cache-entry";
import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";
import type { CacheTotals, ICacheEntryRepository } from "../../domain/interfaces/icache-entry.repository";
import { errorMessage } from "../../domain/errors/app.errors";
import { fingerprint, type FingerprintValue } from "../../domain/utils/fingerprint";

export type CacheInputs = { [key: string]: FingerprintValue };

export interface CacheArtifact {
  data: Buffer;
  contentType: string;
  durationSeconds?: number;
  metadata?: Record<string, string | number | boolean>;
}

export interface GetOrComputeResult {
  entry: CacheEntry;
  wasCached: boolean;
}

export interface CacheCleanupResult {
  deletedEntries: number;
  deletedBytes: number;
  aggressive: boolean; // the size limit forced the shorter age cutoff
}

export interface ContentAddressedCacheOptions {
  maxAgeMs: number;
  aggressiveMaxAgeMs: number;
  maxSizeBytes: number;
  blobPrefix?: string;
}

/**
 * Stores computed artifacts under a fingerprint of the inputs that produced
 * them. A given input set is computed at most once per process at a time.
 */
export class ContentAddressedCache {
  private readonly inFlight = new Map<string, Promise<GetOrComputeResult>>();
  private readonly blobPrefix: string;

  constructor(
    private readonly repository: ICacheEntryRepository,
    private readonly blobStorage: IBlobStorage,
    private readonly options: ContentAddressedCacheOptions
  ) {
    this.blobPrefix = options.blobPrefix ?? "cache";
  }

  fingerprint(namespace: string, inputs: CacheInputs): string {
    return fingerprint(namespace, inputs);
  }

  async getOrCompute(
    namespace: string,
    inputs: CacheInputs,
    compute: () => Promise<CacheArtifact>
  ): Promise<GetOrComputeResult> {
    const key = this.fingerprint(namespace, inputs);

    const pending = this.inFlight.get(key);
    if (pending) {
      const { entry } = await pending;
      const counted = await this.repository.recordHit(key, new Date());
      return { entry: counted ?? entry, wasCached: true };
    }

    const hit = await this.lookup(key);
    if (hit) {
      return { entry: hit, wasCached: true };
    }

    // Another caller may have started computing while the lookup was in flight
    const started = this.inFlight.get(key);
    if (started) {
      const { entry } = await started;
      const counted = await this.repository.recordHit(key, new Date());
      return { entry: counted ?? entry, wasCached: true };
    }

    const computation = this.computeAndStore(key, namespace, compute).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, computation);
    return computation;
  }

  /**
   * Reads the artifact stored for a key without counting a hit.
   */
  async readArtifact(key: string): Promise<{ entry: CacheEntry; data: Buffer } | null> {
    const entry = await this.repository.findByKey(key);
    if (!entry) {
      return null;
    }
    const data = await this.blobStorage.get(entry.payloadRef.blobKey);
    if (!data) {
      console.warn(`[ContentAddressedCache] Blob missing for ${key}, dropping entry`);
      await this.repository.deleteByKey(key);
      return null;
    }
    return { entry, data };
  }

  async cleanup(now: Date = new Date()): Promise<CacheCleanupResult> {
    const expired = await this.evictCreatedBefore(new Date(now.getTime() - this.options.maxAgeMs));

    let aggressive = false;
    let deletedEntries = expired.deletedEntries;
    let deletedBytes = expired.deletedBytes;

    const totals = await this.repository.getTotals();
    if (totals.totalBytes > this.options.maxSizeBytes) {
      console.log(
        `[ContentAddressedCache] Cache holds ${totals.totalBytes} bytes (limit ${this.options.maxSizeBytes}), evicting younger entries`
      );
      const evicted = await this.evictCreatedBefore(new Date(now.getTime() - this.options.aggressiveMaxAgeMs));
      aggressive = true;
      deletedEntries += evicted.deletedEntries;
      deletedBytes += evicted.deletedBytes;
    }

    if (deletedEntries > 0) {
      console.log(`[ContentAddressedCache] Cleanup removed ${deletedEntries} entries (${deletedBytes} bytes)`);
    }

    return { deletedEntries, deletedBytes, aggressive };
  }

  async getInfo(): Promise<CacheTotals & { maxSizeBytes: number; maxAgeMs: number }> {
    const totals = await this.repository.getTotals();
    return { ...totals, maxSizeBytes: this.options.maxSizeBytes, maxAgeMs: this.options.maxAgeMs };
  }

  private async lookup(key: string): Promise<CacheEntry | null> {
    const entry = await this.repository.findByKey(key);
    if (!entry) {
      return null;
    }

    if (!(await this.blobStorage.exists(entry.payloadRef.blobKey))) {
      console.warn(`[ContentAddressedCache] Blob missing for ${key}, recomputing`);
      await this.repository.deleteByKey(key);
      return null;
    }

    return this.repository.recordHit(key, new Date());
  }

  private async computeAndStore(
    key: string,
    namespace: string,
    compute: () => Promise<CacheArtifact>
  ): Promise<GetOrComputeResult> {
    const artifact = await compute();

    // Suffixed so a losing writer can remove its own blob without touching the winner's
    const blobKey = `${this.blobPrefix}/${namespace}/${key}_${randomUUID().slice(0, 8)}`;
    await this.blobStorage.put(blobKey, artifact.data, artifact.contentType);

    const now = new Date();
    const candidate: CacheEntry = {
      id: key,
      key,
      namespace,
      payloadRef: {
        blobKey,
        contentType: artifact.contentType,
        sizeBytes: artifact.data.length,
        durationSeconds: artifact.durationSeconds,
      },
      metadata: artifact.metadata ?? {},
      hitCount: 0,
      lastAccessedAt: now,
      createdAt: now,
    };

    const { entry, inserted } = await this.repository.insertIfAbsent(candidate);
    if (!inserted) {
      console.log(`[ContentAddressedCache] Entry ${key} was written concurrently, keeping the first`);
      await this.blobStorage.delete(blobKey);
    }

    return { entry, wasCached: false };
  }

  private async evictCreatedBefore(cutoff: Date): Promise<{ deletedEntries: number; deletedBytes: number }> {
    const entries = await this.repository.findCreatedBefore(cutoff);
    let deletedEntries = 0;
    let deletedBytes = 0;

    for (const entry of entries) {
      try {
        await this.blobStorage.delete(entry.payloadRef.blobKey);
      } catch (error) {
        console.warn(`[ContentAddressedCache] Failed to delete blob ${entry.payloadRef.blobKey}: ${errorMessage(error)}`);
      }
      if (await this.repository.deleteByKey(entry.key)) {
        deletedEntries++;
        deletedBytes += entry.payloadRef.sizeBytes;
      }
    }

    return { deletedEntries, deletedBytes };
  }
}
