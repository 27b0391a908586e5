import type { TranscriptionStatus, UploadStatus } from "../enums/chunk.status";

export interface ChunkSegment {
  start: number; // seconds, relative to the start of the chunk
  end: number;
  text: string;
  confidence: number; // 0-1
}

export interface Chunk {
  id: string; // minted on every write; (sessionId, sequenceIndex) is the lookup key
  sessionId: string;
  sequenceIndex: number;
  questionId?: string;
  overlapSeconds: number; // audio at the start of this chunk that repeats the previous chunk's tail
  blobKey: string;
  filename: string;
  fileExtension: string;
  mimeType: string;
  sizeBytes: number;
  uploadStatus: UploadStatus;
  transcriptionStatus: TranscriptionStatus;
  transcriptText?: string; // present only when transcriptionStatus is "completed"
  segments: ChunkSegment[];
  confidenceScore?: number;
  durationSeconds?: number;
  language?: string;
  transcriptionAttempts: number;
  lastError?: string;
  processingStartedAt?: Date;
  transcribedAt?: Date;
  uploadedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChunkTranscriptionUpdate {
  transcriptText: string;
  segments: ChunkSegment[];
  confidenceScore: number;
  durationSeconds: number;
  language: string;
  attempts: number;
}

export interface ChunkFailureUpdate {
  error: string;
  attempts: number;
  uploadFailed?: boolean; // the blob itself is unusable
}
