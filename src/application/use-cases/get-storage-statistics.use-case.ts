import type { ChunkStorageTotals, IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { ContentAddressedCache } from "../services/content-addressed.cache";

export interface StorageStatistics {
  sessions: {
    total: number;
    open: number;
    receiving: number;
    completed: number;
    failed: number;
  };
  chunks: ChunkStorageTotals;
  cache: {
    totalEntries: number;
    totalBytes: number;
    totalHits: number;
    maxSizeBytes: number;
  };
}

export class GetStorageStatisticsUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private chunkRepository: IChunkRepository,
    private cache: ContentAddressedCache
  ) {}

  async execute(): Promise<StorageStatistics> {
    const [total, open, receiving, completed, failed, chunks, cacheInfo] = await Promise.all([
      this.sessionRepository.count(),
      this.sessionRepository.count("open"),
      this.sessionRepository.count("receiving"),
      this.sessionRepository.count("completed"),
      this.sessionRepository.count("failed"),
      this.chunkRepository.getStorageTotals(),
      this.cache.getInfo(),
    ]);

    return {
      sessions: { total, open, receiving, completed, failed },
      chunks,
      cache: {
        totalEntries: cacheInfo.totalEntries,
        totalBytes: cacheInfo.totalBytes,
        totalHits: cacheInfo.totalHits,
        maxSizeBytes: cacheInfo.maxSizeBytes,
      },
    };
  }
}
