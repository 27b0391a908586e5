import type { UploadChunkResult } from "../../application/use-cases/upload-chunk.use-case";
import type { Chunk } from "../../domain/entities/chunk";
import { ValidationError } from "../../domain/errors/app.errors";

export interface UploadChunkForm {
  sequenceIndex: number;
  overlapSeconds?: number;
  totalChunksExpected?: number;
  durationSeconds?: number;
  questionId?: string;
  lang?: string;
}

export interface UploadChunkResponse extends UploadChunkResult {
  message: string;
}

export interface ChunkResponse {
  chunkId: string;
  sequenceIndex: number;
  questionId?: string;
  filename: string;
  sizeBytes: number;
  overlapSeconds: number;
  uploadStatus: string;
  transcriptionStatus: string;
  transcriptText?: string;
  confidenceScore?: number;
  durationSeconds?: number;
  language?: string;
  transcriptionAttempts: number;
  lastError?: string;
  uploadedAt: Date;
  transcribedAt?: Date;
}

export function toChunkResponse(chunk: Chunk): ChunkResponse {
  return {
    chunkId: chunk.id,
    sequenceIndex: chunk.sequenceIndex,
    questionId: chunk.questionId,
    filename: chunk.filename,
    sizeBytes: chunk.sizeBytes,
    overlapSeconds: chunk.overlapSeconds,
    uploadStatus: chunk.uploadStatus,
    transcriptionStatus: chunk.transcriptionStatus,
    transcriptText: chunk.transcriptText,
    confidenceScore: chunk.confidenceScore,
    durationSeconds: chunk.durationSeconds,
    language: chunk.language,
    transcriptionAttempts: chunk.transcriptionAttempts,
    lastError: chunk.lastError,
    uploadedAt: chunk.uploadedAt,
    transcribedAt: chunk.transcribedAt,
  };
}

function readField(body: Record<string, unknown>, name: string): unknown {
  const value = body[name];
  return value === "" ? undefined : value;
}

function numberField(body: Record<string, unknown>, name: string, errors: string[]): number | undefined {
  const value = readField(body, name);
  if (value === undefined || value === null) {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  if (!Number.isFinite(parsed)) {
    errors.push(`${name} must be a number`);
    return undefined;
  }
  return parsed;
}

function stringField(body: Record<string, unknown>, name: string, errors: string[]): string | undefined {
  const value = readField(body, name);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    errors.push(`${name} must be a string`);
    return undefined;
  }
  return value.trim() || undefined;
}

/**
 * Reads the text fields of a multipart chunk upload. Range checks happen in the use case.
 */
export function parseUploadChunkForm(body: unknown): UploadChunkForm {
  const fields: Record<string, unknown> = typeof body === "object" && body !== null ? { ...body } : {};
  const errors: string[] = [];

  const sequenceIndex = numberField(fields, "sequenceIndex", errors);
  if (sequenceIndex === undefined && !errors.length) {
    errors.push("sequenceIndex is required");
  }

  const form: UploadChunkForm = {
    sequenceIndex: sequenceIndex ?? -1,
    overlapSeconds: numberField(fields, "overlapSeconds", errors),
    totalChunksExpected: numberField(fields, "totalChunksExpected", errors),
    durationSeconds: numberField(fields, "durationSeconds", errors),
    questionId: stringField(fields, "questionId", errors),
    lang: stringField(fields, "lang", errors),
  };

  if (errors.length > 0) {
    throw new ValidationError("Invalid chunk upload", errors);
  }
  return form;
}

export function toUploadChunkResponse(result: UploadChunkResult): UploadChunkResponse {
  return { ...result, message: result.replaced ? "Chunk replaced" : "Chunk uploaded" };
}
