import type { Chunk } from "../../domain/entities/chunk";
import { errorMessage } from "../../domain/errors/app.errors";
import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";
import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type {
  ITranscriptionProvider,
  TranscriptionOutcome,
} from "../../domain/interfaces/itranscription.provider";
import { clampConfidence, weightedConfidence } from "../../domain/utils/confidence";

export interface TranscriptionWorkerPoolOptions {
  concurrency: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeoutMs: number;
  processingLockTimeoutMs: number; // a processing claim older than this may be taken over
  sleep?: (ms: number) => Promise<void>;
}

export type ChunkSettledListener = (chunk: Chunk) => Promise<void>;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** (attempt - 1));
}

/**
 * Bounded pool of workers draining a FIFO queue of chunk ids. Each chunk is
 * claimed in the repository before it is transcribed, so a chunk enqueued
 * twice, or by two processes, is only worked on once.
 */
export class TranscriptionWorkerPool {
  private readonly queue: string[] = [];
  private readonly queued = new Set<string>();
  private readonly active = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private stopped = false;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly chunkRepository: IChunkRepository,
    private readonly sessionRepository: ISessionRepository,
    private readonly blobStorage: IBlobStorage,
    private readonly provider: ITranscriptionProvider,
    private readonly options: TranscriptionWorkerPoolOptions,
    private readonly onChunkSettled?: ChunkSettledListener
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * @returns false when the chunk is already queued or running, or the pool is stopped
   */
  enqueue(chunkId: string): boolean {
    if (this.stopped || this.queued.has(chunkId) || this.active.has(chunkId)) {
      return false;
    }
    this.queue.push(chunkId);
    this.queued.add(chunkId);
    this.pump();
    return true;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get activeCount(): number {
    return this.active.size;
  }

  /** Resolves once the queue is empty and no worker is running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stops taking new work and waits for running chunks to finish. Queued
   * chunks stay pending in the repository and are picked up by recovery.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.queue.length = 0;
    this.queued.clear();
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active.size === 0;
  }

  private pump(): void {
    while (!this.stopped && this.active.size < this.options.concurrency) {
      const chunkId = this.queue.shift();
      if (chunkId === undefined) {
        break;
      }
      this.queued.delete(chunkId);
      this.active.add(chunkId);

      void this.processChunk(chunkId)
        .catch((error) => {
          console.error(`[TranscriptionWorkerPool] Unexpected error processing chunk ${chunkId}:`, error);
        })
        .finally(() => {
          this.active.delete(chunkId);
          this.pump();
          this.notifyIfIdle();
        });
    }
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  /**
   * Claims and transcribes one chunk, retrying retryable failures with
   * exponential backoff. Returns the settled chunk, or null if the claim was lost.
   */
  async processChunk(chunkId: string): Promise<Chunk | null> {
    const staleBefore = new Date(Date.now() - this.options.processingLockTimeoutMs);
    const chunk = await this.chunkRepository.claimForTranscription(chunkId, staleBefore);
    if (!chunk) {
      console.log(`[TranscriptionWorkerPool] Chunk ${chunkId} already claimed or replaced, skipping`);
      return null;
    }

    console.log(
      `[TranscriptionWorkerPool] Transcribing chunk ${chunk.sequenceIndex} of session ${chunk.sessionId} (${chunk.id})`
    );

    const audio = await this.blobStorage.get(chunk.blobKey);
    if (!audio) {
      console.error(`[TranscriptionWorkerPool] Blob ${chunk.blobKey} missing for chunk ${chunk.id}`);
      const failed = await this.chunkRepository.markTranscriptionFailed(chunk.id, {
        error: "Chunk audio not found in storage",
        attempts: chunk.transcriptionAttempts,
        uploadFailed: true,
      });
      return this.settle(failed);
    }

    let lastError = "";
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const outcome = await this.callProvider(chunk, audio);

      if (outcome.ok) {
        const { result } = outcome;
        const segments = result.segments.map((segment) => ({
          start: segment.start,
          end: segment.end,
          text: segment.text,
          confidence: clampConfidence(segment.confidence),
        }));
        const completed = await this.chunkRepository.markTranscribed(chunk.id, {
          transcriptText: result.text.trim(),
          segments,
          confidenceScore: weightedConfidence(segments),
          durationSeconds: result.durationSeconds,
          language: result.language,
          attempts: attempt,
        });
        if (completed) {
          console.log(
            `[TranscriptionWorkerPool] Chunk ${chunk.id} transcribed (${segments.length} segments, attempt ${attempt})`
          );
        }
        return this.settle(completed);
      }

      lastError = `${outcome.kind}: ${outcome.message}`;
      console.warn(
        `[TranscriptionWorkerPool] Attempt ${attempt}/${this.options.maxAttempts} for chunk ${chunk.id} failed (${lastError})`
      );
      await this.chunkRepository.recordAttempt(chunk.id, attempt, lastError);

      if (outcome.kind === "rejected") {
        const failed = await this.chunkRepository.markTranscriptionFailed(chunk.id, { error: lastError, attempts: attempt });
        return this.settle(failed);
      }

      if (attempt < this.options.maxAttempts) {
        await this.sleep(backoffDelay(attempt, this.options.backoffBaseMs, this.options.backoffMaxMs));
      }
    }

    const failed = await this.chunkRepository.markTranscriptionFailed(chunk.id, {
      error: lastError,
      attempts: this.options.maxAttempts,
    });
    return this.settle(failed);
  }

  private async callProvider(chunk: Chunk, audio: Buffer): Promise<TranscriptionOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<TranscriptionOutcome>((resolve) => {
      timer = setTimeout(
        () => resolve({ ok: false, kind: "timeout", message: `No response within ${this.options.timeoutMs}ms` }),
        this.options.timeoutMs
      );
    });

    try {
      return await Promise.race([
        this.provider.transcribe(
          { audio, filename: chunk.filename, mimeType: chunk.mimeType, language: chunk.language },
          { timeoutMs: this.options.timeoutMs }
        ),
        timeout,
      ]);
    } catch (error) {
      return { ok: false, kind: "transient", message: errorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  // Refreshes the session's totals and lets the lifecycle check for completion
  private async settle(chunk: Chunk | null): Promise<Chunk | null> {
    if (!chunk) {
      return null;
    }

    const totals = await this.chunkRepository.getSessionTotals(chunk.sessionId);
    await this.sessionRepository.updateProgress(chunk.sessionId, totals);

    if (this.onChunkSettled) {
      await this.onChunkSettled(chunk);
    }
    return chunk;
  }
}
