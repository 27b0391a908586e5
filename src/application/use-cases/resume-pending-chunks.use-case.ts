import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { TranscriptionWorkerPool } from "../workers/transcription.worker-pool";

export interface ResumePendingChunksUseCaseParams {
  limit?: number;
  pendingAgeMs: number; // pending chunks younger than this are assumed to still be queued
  processingLockTimeoutMs: number;
}

/**
 * Re-queues chunks whose transcription never started or whose worker died
 * mid-claim (e.g. after a restart).
 */
export class ResumePendingChunksUseCase {
  constructor(
    private chunkRepository: IChunkRepository,
    private workerPool: TranscriptionWorkerPool
  ) {}

  async execute(params: ResumePendingChunksUseCaseParams): Promise<{ found: number; enqueued: number }> {
    const { limit = 100 } = params;
    const now = Date.now();

    const chunks = await this.chunkRepository.findRecoverable(
      new Date(now - params.pendingAgeMs),
      new Date(now - params.processingLockTimeoutMs),
      limit
    );

    let enqueued = 0;
    for (const chunk of chunks) {
      if (this.workerPool.enqueue(chunk.id)) {
        enqueued++;
      }
    }

    if (chunks.length > 0) {
      console.log(`[ResumePendingChunks] Found ${chunks.length} stalled chunks, re-queued ${enqueued}`);
    }

    return { found: chunks.length, enqueued };
  }
}
