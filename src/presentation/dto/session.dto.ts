import type { SessionSummary } from "../../application/use-cases/get-session.use-case";
import type { FinishedOutcome } from "../../application/services/session-lifecycle.service";
import type { Session } from "../../domain/entities/session";
import { toChunkResponse, type ChunkResponse } from "./chunk.dto";

export interface SessionResponse {
  sessionId: string;
  status: string;
  totalChunksExpected?: number;
  chunkCount: number;
  totalDurationSeconds: number;
  failureReason?: string;
  completedAt?: Date;
  failedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionSummaryResponse extends SessionResponse {
  uploadedChunks: number;
  transcribedChunks: number;
  failedChunks: number;
  pendingChunks: number;
  missingIndices: number[];
  chunks: ChunkResponse[];
}

export interface FinalizeSessionResponse {
  status: "completed" | "failed";
  session: SessionResponse;
  reason?: string;
}

export function toSessionResponse(session: Session): SessionResponse {
  return {
    sessionId: session.id,
    status: session.status,
    totalChunksExpected: session.totalChunksExpected,
    chunkCount: session.chunkCount,
    totalDurationSeconds: session.totalDurationSeconds,
    failureReason: session.failureReason,
    completedAt: session.completedAt,
    failedAt: session.failedAt,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

export function toSessionSummaryResponse(summary: SessionSummary): SessionSummaryResponse {
  return {
    ...toSessionResponse(summary.session),
    uploadedChunks: summary.uploadedChunks,
    transcribedChunks: summary.transcribedChunks,
    failedChunks: summary.failedChunks,
    pendingChunks: summary.pendingChunks,
    missingIndices: summary.missingIndices,
    chunks: summary.chunks.map(toChunkResponse),
  };
}

export function toFinalizeSessionResponse(outcome: FinishedOutcome): FinalizeSessionResponse {
  if (outcome.status === "failed") {
    return { status: "failed", session: toSessionResponse(outcome.session), reason: outcome.reason };
  }
  return { status: "completed", session: toSessionResponse(outcome.session) };
}
