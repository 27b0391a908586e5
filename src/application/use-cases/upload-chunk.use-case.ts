import { randomUUID } from "crypto";
import type { Chunk } from "../../domain/entities/chunk";
import type { TranscriptionStatus, UploadStatus } from "../../domain/enums/chunk.status";
import { ValidationError, errorMessage } from "../../domain/errors/app.errors";
import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";
import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { IEventNotifier } from "../../domain/interfaces/ievent.notifier";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import { validateChunkFile, validateSessionId, type ChunkFileRules } from "../../domain/utils/chunk.validator";
import { validateAndNormalizeLanguage } from "../../domain/utils/language.validator";
import type { SessionLifecycleService } from "../services/session-lifecycle.service";
import type { TranscriptionWorkerPool } from "../workers/transcription.worker-pool";

export interface ChunkUpload {
  buffer: Buffer;
  originalName: string;
  mimeType: string;
}

export interface UploadChunkUseCaseParams {
  sessionId: string;
  sequenceIndex: number;
  file: ChunkUpload;
  overlapSeconds?: number;
  totalChunksExpected?: number;
  durationSeconds?: number;
  questionId?: string;
  lang?: string; // ISO-639-1 language hint for transcription
}

export interface UploadChunkResult {
  chunkId: string;
  sessionId: string;
  sequenceIndex: number;
  uploadStatus: UploadStatus;
  transcriptionStatus: TranscriptionStatus;
  replaced: boolean;
  isFinalChunk: boolean;
  warnings: string[];
}

export interface UploadChunkUseCaseOptions extends ChunkFileRules {
  defaultOverlapSeconds: number;
}

export function chunkBlobKey(sessionId: string, sequenceIndex: number, chunkId: string, extension: string): string {
  return `sessions/${sessionId}/chunk_${String(sequenceIndex).padStart(4, "0")}_${chunkId}.${extension}`;
}

/**
 * Stores one chunk of a session's audio, replacing any chunk previously
 * stored at the same index, and queues it for transcription.
 */
export class UploadChunkUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private chunkRepository: IChunkRepository,
    private blobStorage: IBlobStorage,
    private workerPool: TranscriptionWorkerPool,
    private lifecycle: SessionLifecycleService,
    private notifier: IEventNotifier,
    private options: UploadChunkUseCaseOptions
  ) {}

  async execute(params: UploadChunkUseCaseParams): Promise<UploadChunkResult> {
    const { sessionId, sequenceIndex, file } = params;
    const overlapSeconds = params.overlapSeconds ?? this.options.defaultOverlapSeconds;

    // Validate everything before any write
    const errors = validateSessionId(sessionId);
    if (!Number.isInteger(sequenceIndex) || sequenceIndex < 0) {
      errors.push("sequenceIndex must be a non-negative integer");
    }
    if (!Number.isFinite(overlapSeconds) || overlapSeconds < 0) {
      errors.push("overlapSeconds must be a non-negative number");
    }
    if (params.totalChunksExpected !== undefined) {
      if (!Number.isInteger(params.totalChunksExpected) || params.totalChunksExpected <= 0) {
        errors.push("totalChunksExpected must be a positive integer");
      } else if (Number.isInteger(sequenceIndex) && sequenceIndex >= params.totalChunksExpected) {
        errors.push(`sequenceIndex ${sequenceIndex} is outside totalChunksExpected ${params.totalChunksExpected}`);
      }
    }
    if (params.durationSeconds !== undefined && (!Number.isFinite(params.durationSeconds) || params.durationSeconds < 0)) {
      errors.push("durationSeconds must be a non-negative number");
    }
    const validation = validateChunkFile({ originalName: file.originalName, sizeBytes: file.buffer.length }, this.options);
    errors.push(...validation.errors);
    if (errors.length > 0) {
      throw new ValidationError("Invalid chunk upload", errors);
    }

    const { session } = await this.sessionRepository.ensureExists(sessionId);

    const chunkId = randomUUID();
    const blobKey = chunkBlobKey(sessionId, sequenceIndex, chunkId, validation.fileExtension);
    await this.blobStorage.put(blobKey, file.buffer, file.mimeType);

    const now = new Date();
    const candidate: Chunk = {
      id: chunkId,
      sessionId,
      sequenceIndex,
      questionId: params.questionId,
      overlapSeconds,
      blobKey,
      filename: file.originalName,
      fileExtension: validation.fileExtension,
      mimeType: file.mimeType,
      sizeBytes: file.buffer.length,
      uploadStatus: "uploaded",
      transcriptionStatus: "pending",
      segments: [],
      durationSeconds: params.durationSeconds,
      language: validateAndNormalizeLanguage(params.lang),
      transcriptionAttempts: 0,
      uploadedAt: now,
      createdAt: now,
      updatedAt: now,
    };

    let swapped: { chunk: Chunk; previous: Chunk | null };
    try {
      swapped = await this.chunkRepository.swap(candidate);
    } catch (error) {
      // Leave no blob behind for a row that was never written
      await this.blobStorage.delete(blobKey);
      throw error;
    }

    const { chunk, previous } = swapped;
    if (previous && previous.blobKey !== chunk.blobKey) {
      try {
        await this.blobStorage.delete(previous.blobKey);
      } catch (error) {
        console.warn(`[UploadChunk] Could not delete replaced blob ${previous.blobKey}: ${errorMessage(error)}`);
      }
    }

    const totals = await this.chunkRepository.getSessionTotals(sessionId);
    await this.sessionRepository.updateProgress(sessionId, {
      ...totals,
      totalChunksExpected: params.totalChunksExpected,
    });
    if (session.status === "open") {
      await this.sessionRepository.markReceiving(sessionId);
    }

    console.log(
      `[UploadChunk] Stored chunk ${sequenceIndex} of session ${sessionId} (${chunk.sizeBytes} bytes${previous ? ", replaced previous upload" : ""})`
    );

    this.workerPool.enqueue(chunk.id);

    const totalChunksExpected = params.totalChunksExpected ?? session.totalChunksExpected;
    const isFinalChunk = totalChunksExpected !== undefined && sequenceIndex === totalChunksExpected - 1;

    this.notifier.notify({
      type: "chunk.uploaded",
      sessionId,
      occurredAt: now,
      payload: {
        chunkId: chunk.id,
        sequenceIndex,
        sizeBytes: chunk.sizeBytes,
        overlapSeconds,
        questionId: params.questionId,
        totalChunksExpected,
        isFinalChunk,
        replaced: previous !== null,
      },
    });

    // Expected count may arrive after every chunk has already settled
    try {
      await this.lifecycle.checkCompletion(sessionId);
    } catch (error) {
      console.error(`[UploadChunk] Completion check for session ${sessionId} failed:`, error);
    }

    return {
      chunkId: chunk.id,
      sessionId,
      sequenceIndex,
      uploadStatus: chunk.uploadStatus,
      transcriptionStatus: chunk.transcriptionStatus,
      replaced: previous !== null,
      isFinalChunk,
      warnings: validation.warnings,
    };
  }
}
